import { BridgeError } from "./errors";
import { DIGEST_LENGTH, hashNested, keccak } from "./hash";
import { decode, decodeUint, isBytes, isList, type NestedValue } from "../codec/rlp";
import { concatBytes } from "../utils/bytes";
import type { Header, LeafScheme } from "./types";

/* field positions in the child chain's header list */
const PARENT = 0;
const TX_ROOT = 4;
const RECEIPT_ROOT = 5;
const NUMBER = 8;
const TIMESTAMP = 11;
export const MIN_HEADER_FIELDS = 15;

const digestAt = (fields: NestedValue[], i: number, name: string): Uint8Array => {
  const f = fields[i];
  if (!isBytes(f) || f.length !== DIGEST_LENGTH) {
    throw new BridgeError("BadHeaderShape", `${name} must be a ${DIGEST_LENGTH}-byte string`);
  }
  return f;
};

const uintAt = (fields: NestedValue[], i: number, name: string): bigint => {
  const f = fields[i];
  if (!isBytes(f) || f.length > 8) {
    throw new BridgeError("BadHeaderShape", `${name} must be a u64 byte string`);
  }
  try {
    return decodeUint(f, name);
  } catch (e) {
    if (e instanceof BridgeError) throw new BridgeError("BadHeaderShape", e.message);
    throw e;
  }
};

export const fromDecoded = (v: NestedValue): Header => {
  if (!isList(v)) throw new BridgeError("BadHeaderShape", "header is not a list");
  if (v.length < MIN_HEADER_FIELDS) {
    throw new BridgeError("BadHeaderShape", `header has ${v.length} fields, need ${MIN_HEADER_FIELDS}`);
  }
  if (!v.every(isBytes)) throw new BridgeError("BadHeaderShape", "header fields must be byte strings");

  return {
    parentDigest: digestAt(v, PARENT, "parentDigest"),
    transactionsRootDigest: digestAt(v, TX_ROOT, "transactionsRoot"),
    receiptsRootDigest: digestAt(v, RECEIPT_ROOT, "receiptsRoot"),
    number: uintAt(v, NUMBER, "number"),
    timestamp: uintAt(v, TIMESTAMP, "timestamp"),
    raw: v,
  };
};

export const fromBytes = (bytes: Uint8Array): Header => fromDecoded(decode(bytes));

/** Block hash: keccak-256 over the header's RLP re-encoding. */
export const digest = (h: Header): Uint8Array => hashNested([...h.raw]);

const word = (n: bigint): Uint8Array => {
  const out = new Uint8Array(32);
  let x = n;
  for (let i = 31; i >= 0 && x > 0n; i--) {
    out[i] = Number(x & 0xffn);
    x >>= 8n;
  }
  return out;
};

/**
 * Checkpoint-tree leaf for a header.
 * "packed" hashes number ‖ timestamp ‖ txRoot ‖ receiptsRoot as 32-byte words.
 */
export const leafDigest = (h: Header, scheme: LeafScheme = "block-hash"): Uint8Array => {
  switch (scheme) {
    case "block-hash":
      return digest(h);
    case "packed":
      return keccak(
        concatBytes(
          word(h.number),
          word(h.timestamp),
          h.transactionsRootDigest,
          h.receiptsRootDigest,
        ),
      );
  }
};
