export type ErrorKind =
  | "MalformedEncoding"
  | "BadHeaderShape"
  | "OutOfRange"
  | "UnknownCheckpoint"
  | "HeaderNotCommitted"
  | "TxNotIncluded"
  | "ReceiptNotIncluded"
  | "TxReceiptMismatch"
  | "UnrecognizedEvent"
  | "ReceiptFailed"
  | "NotAContractCheck"
  | "TokenNotMapped"
  | "ZeroAmount"
  | "PeriodClosed"
  | "StalePeriod"
  | "PeriodFull"
  | "ReplayedProof";

export interface ProofError {
  readonly kind: ErrorKind;
  readonly message: string;
}

export type Result<T, E = ProofError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (kind: ErrorKind, message: string): Result<never> => ({
  ok: false,
  error: { kind, message },
});

/** Thrown by the codec and header layers; turned into a `Result` at the validator boundary. */
export class BridgeError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = "BridgeError";
    this.kind = kind;
  }

  toProofError(): ProofError {
    return { kind: this.kind, message: this.message };
  }
}

export const isBridgeError = (e: unknown): e is BridgeError =>
  e instanceof BridgeError;

/**
 * Run `fn`, converting a thrown BridgeError into a failed Result.
 * Anything else is a programming error and keeps propagating.
 */
export const attempt = <T>(fn: () => T): Result<T> => {
  try {
    return ok(fn());
  } catch (e) {
    if (isBridgeError(e)) return { ok: false, error: e.toProofError() };
    throw e;
  }
};
