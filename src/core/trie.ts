import { DIGEST_LENGTH, keccak } from "./hash";
import { encode, encodeUint, isBytes, isList, tryDecode, type NestedValue } from "../codec/rlp";
import { decodeHexPrefix, startsWith, toNibbles } from "../codec/nibbles";
import { bytesEqual } from "../utils/bytes";
import type { TrieProof } from "./types";

const BRANCH_WIDTH = 17;
const BRANCH_VALUE = 16;

/** Trie key of the i-th transaction (and receipt) in a block. */
export const trieKeyForIndex = (i: number | bigint): Uint8Array => encode(encodeUint(BigInt(i)));

type NodeRef =
  | { readonly kind: "hash"; readonly digest: Uint8Array }
  | { readonly kind: "inline"; readonly node: NestedValue[] };

/**
 * A child slot holds either a 32-byte digest or, for nodes whose encoding is
 * shorter than 32 bytes, the node itself. Empty means no child.
 */
const childRef = (child: NestedValue | undefined): NodeRef | undefined => {
  if (isBytes(child)) {
    return child.length === DIGEST_LENGTH ? { kind: "hash", digest: child } : undefined;
  }
  if (isList(child) && encode(child).length < DIGEST_LENGTH) {
    return { kind: "inline", node: child };
  }
  return undefined;
};

/**
 * Check that `proof.valueBytes` is stored under `key` in the trie whose root
 * hashes to `rootDigest`. `proof.nodes` are the hash-referenced nodes on the
 * path, root first; every node is re-hashed before it is trusted and all of
 * them must be used.
 */
export const verifyTrieProof = (
  rootDigest: Uint8Array,
  key: Uint8Array,
  proof: TrieProof,
): boolean => {
  if (rootDigest.length !== DIGEST_LENGTH) return false;

  const path = toNibbles(key);
  const { nodes, valueBytes } = proof;
  let cursor = 0; // into nodes
  let pos = 0; // into path
  let ref: NodeRef | undefined = { kind: "hash", digest: rootDigest };

  const found = (value: NestedValue | undefined): boolean =>
    isBytes(value) &&
    value.length > 0 &&
    bytesEqual(value, valueBytes) &&
    cursor === nodes.length;

  while (ref) {
    let node: NestedValue | undefined;
    if (ref.kind === "hash") {
      if (cursor >= nodes.length) return false;
      const raw = nodes[cursor++];
      if (!bytesEqual(keccak(raw), ref.digest)) return false;
      node = tryDecode(raw);
    } else {
      node = ref.node;
    }
    if (!isList(node)) return false;

    if (node.length === BRANCH_WIDTH) {
      if (pos === path.length) return found(node[BRANCH_VALUE]);
      ref = childRef(node[path[pos++]]);
      continue;
    }

    if (node.length === 2) {
      const [encodedPath, next] = node;
      if (!isBytes(encodedPath)) return false;
      const hp = decodeHexPrefix(encodedPath);
      if (!hp || !startsWith(path, pos, hp.nibbles)) return false;
      pos += hp.nibbles.length;
      if (hp.isLeaf) return pos === path.length && found(next);
      // extensions with an empty path are never produced by a canonical trie
      if (hp.nibbles.length === 0) return false;
      ref = childRef(next);
      continue;
    }

    return false;
  }
  return false;
};
