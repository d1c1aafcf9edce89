import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes } from "../utils/bytes";
import { encode, type NestedValue } from "../codec/rlp";

export const DIGEST_LENGTH = 32;

export const keccak = (msg: Uint8Array): Uint8Array => keccak_256(msg);

/* ── keccak(RLP(v)): header identity, trie node references ── */
export const hashNested = (v: NestedValue): Uint8Array => keccak_256(encode(v));

/* ── interior node of the checkpoint tree ─────────────────── */
export const hashPair = (left: Uint8Array, right: Uint8Array): Uint8Array =>
  keccak_256(concatBytes(left, right));

/* ── one level up; odd levels duplicate their last node ───── */
export const merkleLevel = (level: readonly Uint8Array[]): Uint8Array[] => {
  const next: Uint8Array[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i];
    const right = i + 1 < level.length ? level[i + 1] : left;
    next.push(hashPair(left, right));
  }
  return next;
};
