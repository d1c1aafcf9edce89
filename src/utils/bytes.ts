import { concat, equals, fromString, toString } from "uint8arrays";
import type { Hex } from "../types/brands";

const HEX_RE = /^0x(?:[0-9a-fA-F]{2})*$/;

export const isHex = (s: string): s is Hex => HEX_RE.test(s);

export const bytesToHex = (bytes: Uint8Array): Hex =>
  `0x${toString(bytes, "base16")}`;

export const hexToBytes = (hex: string): Uint8Array => {
  if (!isHex(hex)) throw new TypeError(`not an even-length 0x hex string: ${hex}`);
  if (hex.length === 2) return new Uint8Array(0);
  return fromString(hex.slice(2).toLowerCase(), "base16");
};

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => equals(a, b);

export const concatBytes = (...parts: Uint8Array[]): Uint8Array => concat(parts);

/** Left-pad to `width` bytes; throws if `bytes` is already wider. */
export const padLeft = (bytes: Uint8Array, width: number): Uint8Array => {
  if (bytes.length > width) throw new RangeError(`${bytes.length} bytes exceed width ${width}`);
  const out = new Uint8Array(width);
  out.set(bytes, width - bytes.length);
  return out;
};
