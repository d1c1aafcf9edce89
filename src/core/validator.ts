import { treeDepth, verifyInclusion } from "./checkpoint";
import { attempt, fail, ok, type ProofError, type Result } from "./errors";
import { keccak } from "./hash";
import { fromBytes, leafDigest } from "./header";
import { decodeTransferEvent } from "./receipt";
import { decodeTransaction } from "./transaction";
import { verifyTrieProof } from "./trie";
import { bytesEqual } from "../utils/bytes";
import type {
  Checkpoint,
  DepositFact,
  EventDecoder,
  LeafScheme,
  ProofBundle,
  TransferEvent,
} from "./types";

export type ValidatorOptions = {
  leafScheme?: LeafScheme;
  decodeEvent?: EventDecoder;
};

/* ── step 5: the transfer the receipt proves ─────────────── */
const extractTransfer = (
  bundle: ProofBundle,
  decodeEvent: EventDecoder,
): Result<TransferEvent> => {
  const event = attempt(() => decodeEvent(bundle.receiptProof.valueBytes));
  if (!event.ok) return event;

  const tx = attempt(() => decodeTransaction(bundle.txProof.valueBytes));
  if (!tx.ok) return tx;
  if (tx.value.from !== event.value.from) {
    return fail("TxReceiptMismatch", `tx sender ${tx.value.from} is not transfer sender ${event.value.from}`);
  }
  if (tx.value.to !== event.value.token) {
    return fail("TxReceiptMismatch", `tx target ${tx.value.to ?? "(create)"} is not token ${event.value.token}`);
  }
  return event;
};

/**
 * Check a proof bundle against a recorded checkpoint, cheapest checks first.
 * Pure: no ledger is touched, so bundles can be pre-validated in parallel.
 */
export const validate = (
  bundle: ProofBundle,
  checkpoint: Checkpoint,
  opts: ValidatorOptions = {},
): Result<DepositFact> => {
  const scheme = opts.leafScheme ?? "block-hash";
  const decodeEvent = opts.decodeEvent ?? decodeTransferEvent;

  if (bundle.checkpointId !== checkpoint.id) {
    return fail("OutOfRange", `bundle targets checkpoint ${bundle.checkpointId}, got ${checkpoint.id}`);
  }

  /* 1: header and its position in the range */
  const parsed = attempt(() => fromBytes(bundle.header));
  if (!parsed.ok) return parsed;
  const header = parsed.value;
  const leaf = leafDigest(header, scheme);

  const offset = header.number - checkpoint.startNumber;
  const span = checkpoint.endNumber - checkpoint.startNumber;
  if (offset < 0n || offset > span) {
    return fail(
      "OutOfRange",
      `block ${header.number} outside checkpoint ${checkpoint.id} [${checkpoint.startNumber}, ${checkpoint.endNumber}]`,
    );
  }
  const claim = bundle.headerInclusionProof;
  if (
    !Number.isSafeInteger(claim.positionIndex) ||
    BigInt(claim.positionIndex) !== offset ||
    !bytesEqual(claim.headerDigest, leaf)
  ) {
    return fail("OutOfRange", "inclusion proof describes a different header position");
  }
  const positionIndex = claim.positionIndex;

  /* 2: header committed under the checkpoint root */
  const depth = treeDepth(span + 1n);
  if (
    claim.siblingHashes.length !== depth ||
    !verifyInclusion(checkpoint.root, leaf, positionIndex, claim.siblingHashes)
  ) {
    return fail("HeaderNotCommitted", `block ${header.number} not under checkpoint ${checkpoint.id} root`);
  }

  /* 3, 4: transaction and receipt in the block */
  const { txProof, receiptProof } = bundle;
  if (!verifyTrieProof(header.transactionsRootDigest, txProof.key, txProof)) {
    return fail("TxNotIncluded", `transaction not in block ${header.number}`);
  }
  if (!verifyTrieProof(header.receiptsRootDigest, receiptProof.key, receiptProof)) {
    return fail("ReceiptNotIncluded", `receipt not in block ${header.number}`);
  }
  if (!bytesEqual(txProof.key, receiptProof.key)) {
    return fail("TxReceiptMismatch", "transaction and receipt proofs use different indices");
  }

  /* 5: the transfer itself */
  const event = extractTransfer(bundle, decodeEvent);
  if (!event.ok) return event;

  /* 6 */
  return ok({
    owner: event.value.from,
    token: event.value.token,
    amount: event.value.amount,
    sourceTxDigest: keccak(txProof.valueBytes),
  } as DepositFact);
};

export type BatchEntry = { bundle: ProofBundle; checkpoint?: Checkpoint };

/** Relayer-side pre-validation; a missing checkpoint fails that entry only. */
export const validateMany = (
  entries: readonly BatchEntry[],
  opts: ValidatorOptions = {},
): Result<DepositFact, ProofError>[] =>
  entries.map(({ bundle, checkpoint }) =>
    checkpoint
      ? validate(bundle, checkpoint, opts)
      : fail("UnknownCheckpoint", `checkpoint ${bundle.checkpointId} not recorded`),
  );
