/**
 * In-memory Merkle-Patricia trie for relayers that need to produce proofs.
 * Built once from its full entry set; verification lives in core/trie.
 */

import { DIGEST_LENGTH, keccak } from "../core/hash";
import { decode, encode, isBytes, isList, type NestedValue } from "../codec/rlp";
import { decodeHexPrefix, encodeHexPrefix, toNibbles } from "../codec/nibbles";
import { bytesToHex } from "../utils/bytes";
import type { TrieProof } from "../core/types";

const EMPTY = new Uint8Array(0);

/** keccak(RLP("")) */
export const EMPTY_TRIE_ROOT = keccak(encode(EMPTY));

export type TrieEntry = { key: Uint8Array; value: Uint8Array };

type Path = { nibbles: number[]; value: Uint8Array };

const sharedPrefix = (paths: readonly Path[], depth: number): number => {
  const [first, ...rest] = paths;
  let n = 0;
  for (;;) {
    const at = depth + n;
    if (at >= first.nibbles.length) return n;
    const nib = first.nibbles[at];
    if (!rest.every((p) => at < p.nibbles.length && p.nibbles[at] === nib)) return n;
    n++;
  }
};

export class ProofTrie {
  readonly root: Uint8Array;
  private readonly nodes = new Map<string, Uint8Array>(); // digest hex → encoded node
  private readonly entries = new Map<string, TrieEntry>(); // key hex → entry

  constructor(entries: readonly TrieEntry[]) {
    for (const { key, value } of entries) {
      if (value.length === 0) throw new RangeError("trie values must be non-empty");
      this.entries.set(bytesToHex(key), { key, value });
    }
    const paths = [...this.entries.values()].map(({ key, value }) => ({
      nibbles: toNibbles(key),
      value,
    }));
    if (paths.length === 0) {
      this.root = EMPTY_TRIE_ROOT;
      return;
    }
    const encoded = encode(this.build(paths, 0));
    this.root = keccak(encoded);
    this.nodes.set(bytesToHex(this.root), encoded);
  }

  /** Hash-referenced nodes from the root down to `key`'s leaf. */
  proof(key: Uint8Array): TrieProof | undefined {
    const entry = this.entries.get(bytesToHex(key));
    if (!entry) return undefined;

    const path = toNibbles(key);
    const nodes: Uint8Array[] = [];
    let ref: NestedValue = this.root;
    let pos = 0;
    for (;;) {
      let node: NestedValue;
      if (isBytes(ref)) {
        const encoded = this.nodes.get(bytesToHex(ref));
        if (!encoded) return undefined;
        nodes.push(encoded);
        node = decode(encoded);
      } else {
        node = ref;
      }
      if (!isList(node)) return undefined;

      if (node.length === 17) {
        if (pos === path.length) break;
        ref = node[path[pos++]];
        continue;
      }
      const [encodedPath, next]: NestedValue[] = node;
      const hp = isBytes(encodedPath) ? decodeHexPrefix(encodedPath) : undefined;
      if (!hp) return undefined;
      pos += hp.nibbles.length;
      if (hp.isLeaf) break;
      ref = next;
    }
    return { key, valueBytes: entry.value, nodes };
  }

  /* children under 32 encoded bytes are embedded, the rest referenced by digest */
  private ref(node: NestedValue[]): NestedValue {
    const encoded = encode(node);
    if (encoded.length < DIGEST_LENGTH) return node;
    const digest = keccak(encoded);
    this.nodes.set(bytesToHex(digest), encoded);
    return digest;
  }

  private build(paths: Path[], depth: number): NestedValue[] {
    if (paths.length === 1) {
      const [only] = paths;
      return [encodeHexPrefix(only.nibbles.slice(depth), true), only.value];
    }

    const shared = sharedPrefix(paths, depth);
    if (shared > 0) {
      const prefix = paths[0].nibbles.slice(depth, depth + shared);
      return [encodeHexPrefix(prefix, false), this.ref(this.build(paths, depth + shared))];
    }

    const branch: NestedValue[] = Array.from({ length: 17 }, () => EMPTY);
    for (let nib = 0; nib < 16; nib++) {
      const group = paths.filter((p) => p.nibbles.length > depth && p.nibbles[depth] === nib);
      if (group.length) branch[nib] = this.ref(this.build(group, depth + 1));
    }
    const terminal = paths.find((p) => p.nibbles.length === depth);
    if (terminal) branch[16] = terminal.value;
    return branch;
  }
}
