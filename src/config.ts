import * as v from "valibot";

const flag = v.pipe(
  v.picklist(["0", "1", "false", "true"]),
  v.transform((s) => s === "1" || s === "true"),
);

export const envSchema = v.object({
  CHILD_BLOCK_INTERVAL: v.optional(
    v.pipe(v.string(), v.regex(/^\d+$/), v.transform<string, bigint>(BigInt), v.minValue(2n)),
    "10000",
  ),
  LOG_LEVEL: v.optional(
    v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: v.optional(flag, "false"),
  CHECKPOINT_LEAF_SCHEME: v.optional(v.picklist(["block-hash", "packed"]), "block-hash"),
  REQUIRE_PLAIN_ACCOUNT: v.optional(flag, "false"),
});

export type Config = {
  childBlockInterval: bigint;
  logLevel: v.InferOutput<typeof envSchema>["LOG_LEVEL"];
  logPretty: boolean;
  leafScheme: v.InferOutput<typeof envSchema>["CHECKPOINT_LEAF_SCHEME"];
  requirePlainAccount: boolean;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const parsed = v.safeParse(envSchema, env);
  if (!parsed.success) {
    const detail = parsed.issues
      .map((i) => `${v.getDotPath(i) ?? "env"}: ${i.message}`)
      .join("; ");
    throw new Error(`invalid configuration: ${detail}`);
  }
  const e = parsed.output;
  return {
    childBlockInterval: e.CHILD_BLOCK_INTERVAL,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    leafScheme: e.CHECKPOINT_LEAF_SCHEME,
    requirePlainAccount: e.REQUIRE_PLAIN_ACCOUNT,
  };
};
