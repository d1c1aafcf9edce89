import pino from "pino";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: Record<string, unknown>): ILogger;
}

export type LoggerOptions = {
  /** human-readable output through pino-pretty; off for machine logs and tests */
  pretty?: boolean;
};

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  opts: LoggerOptions = {},
): ILogger =>
  pino({
    level,
    ...(opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger = (): ILogger => makeLogger("silent");
