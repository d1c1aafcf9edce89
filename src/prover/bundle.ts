import { ProofTrie } from "./trie";
import { buildRoot, proofFor } from "../core/checkpoint";
import { fromBytes } from "../core/header";
import { trieKeyForIndex } from "../core/trie";
import { bytesEqual } from "../utils/bytes";
import { asCheckpointId } from "../types/brands";
import type { Checkpoint, Header, LeafScheme, ProofBundle } from "../core/types";

/** Trie of a block's transactions or receipts, keyed by RLP(index). */
export const indexTrie = (items: readonly Uint8Array[]): ProofTrie =>
  new ProofTrie(items.map((value, i) => ({ key: trieKeyForIndex(i), value })));

/** What the checkpoint committer records for a contiguous header range. */
export const commitCheckpoint = (
  id: number,
  headers: readonly Header[],
  committedAt: bigint,
  scheme: LeafScheme = "block-hash",
): Checkpoint => {
  if (headers.length === 0) throw new RangeError("checkpoint needs at least one header");
  headers.forEach((h, i) => {
    if (i > 0 && h.number !== headers[i - 1].number + 1n) {
      throw new RangeError(`header ${h.number} does not follow ${headers[i - 1].number}`);
    }
  });
  return {
    id: asCheckpointId(id),
    startNumber: headers[0].number,
    endNumber: headers[headers.length - 1].number,
    root: buildRoot(headers, scheme),
    committedAt,
  };
};

export type BundleInput = {
  checkpoint: Checkpoint;
  /** RLP-encoded headers of the whole checkpoint range, in order */
  headers: readonly Uint8Array[];
  blockNumber: bigint;
  transactions: readonly Uint8Array[];
  receipts: readonly Uint8Array[];
  txIndex: number;
  scheme?: LeafScheme;
};

/**
 * Assemble the proof bundle for `transactions[txIndex]` of `blockNumber`.
 * Throws if the supplied block contents do not match the header's roots.
 */
export const buildBundle = (input: BundleInput): ProofBundle => {
  const { checkpoint, blockNumber, txIndex } = input;
  const headers = input.headers.map(fromBytes);
  const position = headers.findIndex((h) => h.number === blockNumber);
  if (position < 0) throw new RangeError(`block ${blockNumber} not in supplied headers`);
  const header = headers[position];

  const txTrie = indexTrie(input.transactions);
  const receiptTrie = indexTrie(input.receipts);
  if (!bytesEqual(txTrie.root, header.transactionsRootDigest)) {
    throw new Error(`transactions do not match the transactions root of block ${blockNumber}`);
  }
  if (!bytesEqual(receiptTrie.root, header.receiptsRootDigest)) {
    throw new Error(`receipts do not match the receipts root of block ${blockNumber}`);
  }

  const key = trieKeyForIndex(txIndex);
  const txProof = txTrie.proof(key);
  const receiptProof = receiptTrie.proof(key);
  if (!txProof || !receiptProof) throw new RangeError(`no transaction at index ${txIndex}`);

  return {
    checkpointId: checkpoint.id,
    header: input.headers[position],
    headerInclusionProof: proofFor(headers, position, input.scheme),
    txProof,
    receiptProof,
  };
};
