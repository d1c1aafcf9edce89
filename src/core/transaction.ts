import { BridgeError } from "./errors";
import { keccak } from "./hash";
import { recoverAddress } from "../crypto/secp256k1";
import { decode, decodeUint, encode, encodeUint, isBytes, isList, type NestedValue } from "../codec/rlp";
import { bytesToHex, concatBytes } from "../utils/bytes";
import type { Address } from "../types/brands";

export type TxType = 0 | 1 | 2;

export type ChildTransaction = {
  type: TxType;
  chainId?: bigint;
  nonce: bigint;
  /** undefined for contract creation */
  to?: Address;
  value: bigint;
  data: Uint8Array;
  from: Address;
  hash: Uint8Array;
};

/* field layout per envelope: how many fields, which are signed, where things sit */
type Layout = {
  size: number;
  signed: number;
  nonce: number;
  to: number;
  value: number;
  data: number;
};

const LAYOUTS: Record<TxType, Layout> = {
  // [nonce, gasPrice, gasLimit, to, value, data, v, r, s]
  0: { size: 9, signed: 6, nonce: 0, to: 3, value: 4, data: 5 },
  // [chainId, nonce, gasPrice, gasLimit, to, value, data, accessList, yParity, r, s]
  1: { size: 11, signed: 8, nonce: 1, to: 4, value: 5, data: 6 },
  // [chainId, nonce, maxPriorityFee, maxFee, gasLimit, to, value, data, accessList, yParity, r, s]
  2: { size: 12, signed: 9, nonce: 1, to: 5, value: 6, data: 7 },
};

const malformed = (msg: string) => new BridgeError("MalformedEncoding", `transaction: ${msg}`);

const bytesAt = (f: NestedValue[], i: number): Uint8Array => {
  const v = f[i];
  if (!isBytes(v)) throw malformed(`field ${i} must be a byte string`);
  return v;
};

const toAddress = (b: Uint8Array): Address | undefined => {
  if (b.length === 0) return undefined;
  if (b.length !== 20) throw malformed(`'to' has ${b.length} bytes`);
  return bytesToHex(b);
};

const splitEnvelope = (bytes: Uint8Array): { type: TxType; fields: NestedValue[] } => {
  if (bytes.length === 0) throw malformed("empty");
  const first = bytes[0];
  let type: TxType;
  let body: Uint8Array;
  if (first >= 0xc0) {
    type = 0;
    body = bytes;
  } else if (first === 1 || first === 2) {
    type = first === 1 ? 1 : 2;
    body = bytes.subarray(1);
  } else {
    throw malformed(`unsupported envelope type ${first}`);
  }
  const fields = decode(body);
  if (!isList(fields) || fields.length !== LAYOUTS[type].size) {
    throw malformed(`type ${type} needs ${LAYOUTS[type].size} fields`);
  }
  return { type, fields };
};

/** Signing hash and recovery parameters for the envelope. */
const signingData = (
  type: TxType,
  fields: NestedValue[],
): { sigHash: Uint8Array; chainId?: bigint; recovery: number } => {
  const layout = LAYOUTS[type];
  const signed = fields.slice(0, layout.signed);

  if (type !== 0) {
    const yParity = decodeUint(fields[layout.signed], "yParity");
    if (yParity > 1n) throw malformed(`yParity ${yParity}`);
    return {
      sigHash: keccak(concatBytes(Uint8Array.of(type), encode(signed))),
      chainId: decodeUint(fields[0], "chainId"),
      recovery: Number(yParity),
    };
  }

  const v = decodeUint(fields[6], "v");
  if (v === 27n || v === 28n) {
    return { sigHash: keccak(encode(signed)), recovery: Number(v - 27n) };
  }
  if (v < 35n) throw malformed(`v ${v}`);
  // EIP-155: chainId and two empty fields take the place of (v, r, s)
  const chainId = (v - 35n) / 2n;
  return {
    sigHash: keccak(encode([...signed, encodeUint(chainId), new Uint8Array(0), new Uint8Array(0)])),
    chainId,
    recovery: Number((v - 35n) % 2n),
  };
};

export const decodeTransaction = (bytes: Uint8Array): ChildTransaction => {
  const { type, fields } = splitEnvelope(bytes);
  const layout = LAYOUTS[type];
  const { sigHash, chainId, recovery } = signingData(type, fields);
  const r = decodeUint(fields[layout.size - 2], "r");
  const s = decodeUint(fields[layout.size - 1], "s");

  let from: Address;
  try {
    from = recoverAddress(sigHash, { r, s, recovery });
  } catch (e) {
    throw malformed(`unrecoverable signature (${e instanceof Error ? e.message : String(e)})`);
  }

  return {
    type,
    chainId,
    nonce: decodeUint(fields[layout.nonce], "nonce"),
    to: toAddress(bytesAt(fields, layout.to)),
    value: decodeUint(fields[layout.value], "value"),
    data: bytesAt(fields, layout.data),
    from,
    hash: keccak(bytes),
  };
};
