import { BridgeError } from "./errors";
import { keccak } from "./hash";
import { decode, isBytes, isList, type NestedValue } from "../codec/rlp";
import { bytesEqual, bytesToHex } from "../utils/bytes";
import type { Address, TransferEvent } from "./types";

/** topic0 of `Transfer(address,address,uint256)` */
export const TRANSFER_TOPIC = keccak(new TextEncoder().encode("Transfer(address,address,uint256)"));

export type ReceiptLog = {
  address: Address;
  topics: Uint8Array[];
  data: Uint8Array;
};

export type ChildReceipt = {
  /** undefined for pre-Byzantium receipts, which carry a state root instead */
  succeeded?: boolean;
  logs: ReceiptLog[];
};

const malformed = (msg: string) => new BridgeError("MalformedEncoding", `receipt: ${msg}`);

const decodeLog = (v: NestedValue): ReceiptLog => {
  if (!isList(v) || v.length !== 3) throw malformed("log must be [address, topics, data]");
  const [address, topics, data] = v;
  if (!isBytes(address) || address.length !== 20) throw malformed("log address");
  if (!isList(topics) || !topics.every((t): t is Uint8Array => isBytes(t) && t.length === 32)) {
    throw malformed("log topics");
  }
  if (!isBytes(data)) throw malformed("log data");
  return { address: bytesToHex(address), topics, data };
};

/** Legacy receipts are a bare RLP list; typed ones are prefixed with their type byte. */
export const decodeReceipt = (bytes: Uint8Array): ChildReceipt => {
  if (bytes.length === 0) throw malformed("empty");
  const first = bytes[0];
  if (first < 0xc0 && first !== 1 && first !== 2) throw malformed(`unsupported receipt type ${first}`);
  const body = first >= 0xc0 ? bytes : bytes.subarray(1);
  const fields = decode(body);
  if (!isList(fields) || fields.length !== 4) throw malformed("expected 4 fields");
  const [status, , , logs] = fields;
  if (!isBytes(status)) throw malformed("status");
  if (!isList(logs)) throw malformed("logs");

  let succeeded: boolean | undefined;
  if (status.length === 0) succeeded = false;
  else if (status.length === 1 && status[0] === 1) succeeded = true;
  else if (status.length !== 32) throw malformed("status must be 0, 1 or a state root");

  return { succeeded, logs: logs.map(decodeLog) };
};

const topicAddress = (topic: Uint8Array): Address => bytesToHex(topic.subarray(12));

/** First ERC-20 Transfer log of a successful receipt. */
export const decodeTransferEvent = (receiptBytes: Uint8Array): TransferEvent => {
  const receipt = decodeReceipt(receiptBytes);
  if (receipt.succeeded === false) {
    throw new BridgeError("ReceiptFailed", "transaction reverted on the child chain");
  }
  const log = receipt.logs.find(
    (l) => l.topics.length === 3 && bytesEqual(l.topics[0], TRANSFER_TOPIC) && l.data.length === 32,
  );
  if (!log) throw new BridgeError("UnrecognizedEvent", "no Transfer log in receipt");

  return {
    token: log.address,
    from: topicAddress(log.topics[1]),
    to: topicAddress(log.topics[2]),
    amount: BigInt(bytesToHex(log.data)),
  };
};
