import type { NestedValue } from "../codec/rlp";
import type { Address, Brand, CheckpointId } from "../types/brands";

export type { Address, Hex } from "../types/brands";

/* ── child-chain block header ───────────────────────────── */
export type Header = {
  readonly number: bigint;
  readonly timestamp: bigint;
  readonly parentDigest: Uint8Array;
  readonly transactionsRootDigest: Uint8Array;
  readonly receiptsRootDigest: Uint8Array;
  /** every decoded field, in order; the header hash is taken over this */
  readonly raw: readonly NestedValue[];
};

/** Leaf convention for the checkpoint tree. */
export type LeafScheme = "block-hash" | "packed";

/* ── checkpoint recorded on the root ledger ─────────────── */
export type Checkpoint = {
  readonly id: CheckpointId;
  readonly startNumber: bigint;
  readonly endNumber: bigint;
  readonly root: Uint8Array;
  readonly committedAt: bigint;
};

/* ── proof structures (caller supplied, untrusted) ──────── */
export type TrieProof = {
  readonly key: Uint8Array;
  readonly valueBytes: Uint8Array;
  readonly nodes: readonly Uint8Array[];
};

export type HeaderInclusionProof = {
  readonly headerDigest: Uint8Array;
  readonly positionIndex: number;
  readonly siblingHashes: readonly Uint8Array[];
};

export type ProofBundle = {
  readonly checkpointId: CheckpointId;
  /** RLP-encoded block header */
  readonly header: Uint8Array;
  readonly headerInclusionProof: HeaderInclusionProof;
  /** valueBytes = transaction bytes */
  readonly txProof: TrieProof;
  /** valueBytes = receipt bytes */
  readonly receiptProof: TrieProof;
};

/* ── facts & ledger records ─────────────────────────────── */
export type TransferEvent = {
  readonly from: Address;
  readonly to: Address;
  readonly token: Address;
  readonly amount: bigint;
};

type DepositFactFields = {
  readonly owner: Address;
  readonly token: Address;
  readonly amount: bigint;
  readonly sourceTxDigest: Uint8Array;
};

/** Only the validator mints these. */
export type DepositFact = Brand<DepositFactFields, "DepositFact">;

export type DepositSlot = {
  readonly periodHeaderRef: bigint;
  readonly owner: Address;
  readonly token: Address;
  readonly amount: bigint;
  readonly createdAt: bigint;
};

export type PeriodStatus = "open" | "closed";

/* ── external collaborators ─────────────────────────────── */
export interface CheckpointSource {
  getCheckpoint(id: CheckpointId): Checkpoint | undefined;
}

export interface TokenRegistry {
  isTokenMapped(token: Address): boolean;
}

export interface AccountClassifier {
  /** true for simple externally-owned accounts, false for on-chain programs */
  isPlainAccount(address: Address): boolean;
}

/** Throws BridgeError("UnrecognizedEvent" | "ReceiptFailed" | "MalformedEncoding"). */
export type EventDecoder = (receiptBytes: Uint8Array) => TransferEvent;
