export * from "./core/types";
export * from "./core/errors";
export { decode, encode, encodeUint, decodeUint, isBytes, isList } from "./codec/rlp";
export type { NestedValue } from "./codec/rlp";
export { digest as headerDigest, fromBytes as headerFromBytes, fromDecoded as headerFromDecoded, leafDigest } from "./core/header";
export { verifyTrieProof, trieKeyForIndex } from "./core/trie";
export { buildRoot, proofFor, treeDepth, verifyInclusion } from "./core/checkpoint";
export { validate, validateMany } from "./core/validator";
export type { ValidatorOptions, BatchEntry } from "./core/validator";
export { decodeTransaction } from "./core/transaction";
export type { ChildTransaction } from "./core/transaction";
export { decodeReceipt, decodeTransferEvent, TRANSFER_TOPIC } from "./core/receipt";
export { DepositLedger, DEFAULT_CHILD_BLOCK_INTERVAL } from "./core/ledger";
export type { LedgerOptions } from "./core/ledger";
export { MemoryCheckpointSource, MemoryTokenRegistry, denyListClassifier } from "./core/registry";
export { Bridge, createBridge } from "./core/bridge";
export type { BridgeOptions, BridgeDeps, TrieProofInput } from "./core/bridge";
export { ProofTrie, EMPTY_TRIE_ROOT } from "./prover/trie";
export { buildBundle, commitCheckpoint, indexTrie } from "./prover/bundle";
export { loadConfig } from "./config";
export type { Config } from "./config";
export { depositRequestSchema } from "./schema";
export { makeLogger } from "./logging";
export type { ILogger } from "./logging";
export { asCheckpointId, asSlotId } from "./types/brands";
export type { Brand, CheckpointId, SlotId } from "./types/brands";
