import { encode, encodeUint, type NestedValue } from "../../src/codec/rlp";
import { keccak } from "../../src/core/hash";
import { fromBytes } from "../../src/core/header";
import { TRANSFER_TOPIC } from "../../src/core/receipt";
import { addr, pub, sign, type PrivKey } from "../../src/crypto/secp256k1";
import { indexTrie } from "../../src/prover/bundle";
import { hexToBytes, padLeft } from "../../src/utils/bytes";
import type { Address, Header } from "../../src/core/types";

export const CHAIN_ID = 15001n;
const EMPTY = new Uint8Array(0);
const zeros = (n: number) => new Uint8Array(n);

/* placeholder keys; any scalar in [1, n) is a valid secp256k1 key */
export const key = (seed: number): PrivKey => new Uint8Array(32).fill(seed);
export const addressOf = (priv: PrivKey): Address => addr(pub(priv));

export const TOKEN: Address = "0x00000000000000000000000000000000000000c0";
export const OTHER_TOKEN: Address = "0x00000000000000000000000000000000000000c1";
export const RECIPIENT: Address = "0x0000000000000000000000000000000000000bee";

const word = (n: bigint) => padLeft(encodeUint(n), 32);

/* ── transactions ───────────────────────────────────────── */
export const transferCalldata = (to: Address, amount: bigint): Uint8Array =>
  Uint8Array.from([...hexToBytes("0xa9059cbb"), ...padLeft(hexToBytes(to), 32), ...word(amount)]);

export type TxInput = {
  priv: PrivKey;
  nonce?: bigint;
  to?: Address;
  value?: bigint;
  data?: Uint8Array;
};

/** EIP-155 legacy transaction. */
export const signLegacyTx = (tx: TxInput): Uint8Array => {
  const fields: NestedValue[] = [
    encodeUint(tx.nonce ?? 0n),
    encodeUint(1_000_000_000n),
    encodeUint(100_000n),
    tx.to ? hexToBytes(tx.to) : EMPTY,
    encodeUint(tx.value ?? 0n),
    tx.data ?? EMPTY,
  ];
  const sigHash = keccak(encode([...fields, encodeUint(CHAIN_ID), EMPTY, EMPTY]));
  const sig = sign(sigHash, tx.priv);
  const v = CHAIN_ID * 2n + 35n + BigInt(sig.recovery);
  return encode([...fields, encodeUint(v), encodeUint(sig.r), encodeUint(sig.s)]);
};

/** EIP-1559 (type 2) transaction. */
export const signDynamicFeeTx = (tx: TxInput): Uint8Array => {
  const fields: NestedValue[] = [
    encodeUint(CHAIN_ID),
    encodeUint(tx.nonce ?? 0n),
    encodeUint(1n),
    encodeUint(2_000_000_000n),
    encodeUint(100_000n),
    tx.to ? hexToBytes(tx.to) : EMPTY,
    encodeUint(tx.value ?? 0n),
    tx.data ?? EMPTY,
    [],
  ];
  const sigHash = keccak(Uint8Array.from([2, ...encode(fields)]));
  const sig = sign(sigHash, tx.priv);
  return Uint8Array.from([
    2,
    ...encode([...fields, encodeUint(BigInt(sig.recovery)), encodeUint(sig.r), encodeUint(sig.s)]),
  ]);
};

export const erc20Transfer = (priv: PrivKey, amount: bigint, nonce = 0n, token = TOKEN): Uint8Array =>
  signLegacyTx({ priv, nonce, to: token, data: transferCalldata(RECIPIENT, amount) });

/* ── receipts ───────────────────────────────────────────── */
export type LogInput = { address: Address; topics: Uint8Array[]; data: Uint8Array };

export const transferLog = (token: Address, from: Address, to: Address, amount: bigint): LogInput => ({
  address: token,
  topics: [TRANSFER_TOPIC, padLeft(hexToBytes(from), 32), padLeft(hexToBytes(to), 32)],
  data: word(amount),
});

export const receipt = (logs: LogInput[], succeeded = true, type?: number): Uint8Array => {
  const body = encode([
    succeeded ? Uint8Array.of(1) : EMPTY,
    encodeUint(21_000n),
    zeros(256),
    logs.map((l) => [hexToBytes(l.address), l.topics, l.data]),
  ]);
  return type === undefined ? body : Uint8Array.from([type, ...body]);
};

export const transferReceipt = (from: Address, amount: bigint, token = TOKEN): Uint8Array =>
  receipt([transferLog(token, from, RECIPIENT, amount)]);

/* ── headers & blocks ───────────────────────────────────── */
export type HeaderInput = {
  number: bigint;
  timestamp?: bigint;
  parent?: Uint8Array;
  transactionsRoot?: Uint8Array;
  receiptsRoot?: Uint8Array;
};

export const headerFields = (h: HeaderInput): Uint8Array[] => [
  h.parent ?? zeros(32),
  keccak(encode([])), // ommers hash
  zeros(20), // coinbase
  zeros(32), // state root
  h.transactionsRoot ?? zeros(32),
  h.receiptsRoot ?? zeros(32),
  zeros(256), // logs bloom
  encodeUint(1n), // difficulty
  encodeUint(h.number),
  encodeUint(30_000_000n),
  encodeUint(21_000n),
  encodeUint(h.timestamp ?? 1_700_000_000n + h.number * 2n),
  EMPTY, // extra data
  zeros(32), // mix hash
  zeros(8), // nonce
];

export const encodeHeader = (h: HeaderInput): Uint8Array => encode(headerFields(h));

export type Block = {
  number: bigint;
  header: Uint8Array;
  parsed: Header;
  transactions: Uint8Array[];
  receipts: Uint8Array[];
};

export type BlockContents = { transactions: Uint8Array[]; receipts: Uint8Array[] };

/** Consecutive blocks linked by parent digest, roots computed from their contents. */
export const makeChain = (start: bigint, contents: BlockContents[]): Block[] => {
  const blocks: Block[] = [];
  let parent: Uint8Array = zeros(32);
  contents.forEach((c, i) => {
    const number = start + BigInt(i);
    const header = encodeHeader({
      number,
      parent,
      transactionsRoot: indexTrie(c.transactions).root,
      receiptsRoot: indexTrie(c.receipts).root,
    });
    parent = keccak(header);
    blocks.push({ number, header, parsed: fromBytes(header), ...c });
  });
  return blocks;
};

/** Block with `n` ERC-20 transfers from distinct senders, seeded from `seed`. */
export const transfersBlock = (n: number, amount = 10n, seed = 1): BlockContents => {
  const transactions: Uint8Array[] = [];
  const receipts: Uint8Array[] = [];
  for (let i = 0; i < n; i++) {
    const priv = key(seed + i);
    transactions.push(erc20Transfer(priv, amount + BigInt(i)));
    receipts.push(transferReceipt(addressOf(priv), amount + BigInt(i)));
  }
  return { transactions, receipts };
};
