/**
 * Binary keccak Merkle tree over a checkpoint's header range.
 *
 * Leaves are header digests in block-number order. Interior nodes are
 * keccak(left ‖ right); a level with an odd number of nodes is padded by
 * duplicating its last node. A one-header checkpoint's root is the leaf itself.
 */

import { DIGEST_LENGTH, hashPair, merkleLevel } from "./hash";
import { leafDigest } from "./header";
import { bytesEqual } from "../utils/bytes";
import type { Header, HeaderInclusionProof, LeafScheme } from "./types";

/** Levels above the leaves for a tree of `leafCount` leaves. */
export const treeDepth = (leafCount: number | bigint): number => {
  if (typeof leafCount === "bigint") {
    if (leafCount < 1n) throw new RangeError(`leaf count must be a positive integer, got ${leafCount}`);
    // ceil(log2(n)): bit length of n - 1
    return leafCount === 1n ? 0 : (leafCount - 1n).toString(2).length;
  }
  if (!Number.isSafeInteger(leafCount) || leafCount < 1) {
    throw new RangeError(`leaf count must be a positive integer, got ${leafCount}`);
  }
  let depth = 0;
  for (let size = leafCount; size > 1; size = Math.ceil(size / 2)) depth++;
  return depth;
};

export const rootFromLeaves = (leaves: readonly Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) throw new RangeError("checkpoint tree needs at least one leaf");
  let level = [...leaves];
  while (level.length > 1) level = merkleLevel(level);
  return level[0];
};

export const buildRoot = (
  headers: readonly Header[],
  scheme: LeafScheme = "block-hash",
): Uint8Array => rootFromLeaves(headers.map((h) => leafDigest(h, scheme)));

export const proofFromLeaves = (
  leaves: readonly Uint8Array[],
  index: number,
): HeaderInclusionProof => {
  if (!Number.isSafeInteger(index) || index < 0 || index >= leaves.length) {
    throw new RangeError(`index ${index} outside [0, ${leaves.length})`);
  }
  const siblingHashes: Uint8Array[] = [];
  let level = [...leaves];
  let i = index;
  while (level.length > 1) {
    const sibling = i ^ 1;
    siblingHashes.push(sibling < level.length ? level[sibling] : level[i]);
    level = merkleLevel(level);
    i >>= 1;
  }
  return { headerDigest: leaves[index], positionIndex: index, siblingHashes };
};

export const proofFor = (
  headers: readonly Header[],
  index: number,
  scheme: LeafScheme = "block-hash",
): HeaderInclusionProof =>
  proofFromLeaves(
    headers.map((h) => leafDigest(h, scheme)),
    index,
  );

/**
 * Recompute the path from `leaf` to the root. Bit k of `index` set
 * means the running hash is the right child at level k.
 */
export const verifyInclusion = (
  root: Uint8Array,
  leaf: Uint8Array,
  index: number,
  siblings: readonly Uint8Array[],
): boolean => {
  if (root.length !== DIGEST_LENGTH || leaf.length !== DIGEST_LENGTH) return false;
  if (!Number.isSafeInteger(index) || index < 0) return false;
  if (index >= 2 ** siblings.length) return false;

  let current = leaf;
  let i = index;
  for (const sibling of siblings) {
    if (sibling.length !== DIGEST_LENGTH) return false;
    // a right child equal to its left sibling only exists as odd-level padding
    if (i % 2 === 1 && bytesEqual(sibling, current)) return false;
    current = i % 2 === 1 ? hashPair(sibling, current) : hashPair(current, sibling);
    i = Math.floor(i / 2);
  }
  return bytesEqual(current, root);
};
