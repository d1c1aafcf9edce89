// RLP for headers, transactions, receipts and trie nodes.
// Byte-level work is delegated to @ethereumjs/rlp; this layer pins the error
// taxonomy and the scalar conventions.

import { decode as rlpDecode, encode as rlpEncode } from "@ethereumjs/rlp";
import { BridgeError } from "../core/errors";
import { bytesToHex, hexToBytes } from "../utils/bytes";

export type NestedValue = Uint8Array | NestedValue[];

export const isBytes = (v: NestedValue | undefined): v is Uint8Array =>
  v instanceof Uint8Array;
export const isList = (v: NestedValue | undefined): v is NestedValue[] =>
  Array.isArray(v);

/* nested values */
export const encode = (v: NestedValue): Uint8Array => rlpEncode(v);

export const decode = (bytes: Uint8Array): NestedValue => {
  // @ethereumjs/rlp maps empty input to an empty string, which would not re-encode to itself
  if (bytes.length === 0) {
    throw new BridgeError("MalformedEncoding", "empty input");
  }
  try {
    return rlpDecode(bytes);
  } catch (e) {
    // covers the library's truncation/remainder/canonical-form checks and
    // stack exhaustion on pathologically nested lists
    const reason = e instanceof Error ? e.message : String(e);
    throw new BridgeError("MalformedEncoding", reason);
  }
};

/** Decode without throwing; `undefined` for anything malformed. */
export const tryDecode = (bytes: Uint8Array): NestedValue | undefined => {
  try {
    return decode(bytes);
  } catch (e) {
    if (e instanceof BridgeError) return undefined;
    throw e;
  }
};

/* scalars */
const MAX_UINT_BYTES = 32;

export const encodeUint = (n: bigint): Uint8Array => {
  if (n < 0n) throw new RangeError(`negative integer: ${n}`);
  if (n === 0n) return new Uint8Array(0);
  const hex = n.toString(16);
  return hexToBytes(`0x${hex.length % 2 ? "0" : ""}${hex}`);
};

export const decodeUint = (b: NestedValue | undefined, what = "integer"): bigint => {
  if (!isBytes(b)) throw new BridgeError("MalformedEncoding", `${what}: expected a byte string`);
  if (b.length > MAX_UINT_BYTES) {
    throw new BridgeError("MalformedEncoding", `${what}: ${b.length} bytes exceed ${MAX_UINT_BYTES}`);
  }
  if (b.length === 0) return 0n;
  if (b[0] === 0) throw new BridgeError("MalformedEncoding", `${what}: leading zero byte`);
  return BigInt(bytesToHex(b));
};
