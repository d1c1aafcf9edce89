import * as v from "valibot";
import { asCheckpointId } from "./types/brands";
import { hexToBytes } from "./utils/bytes";

export const hexBytesSchema = v.pipe(
  v.string(),
  v.regex(/^0x(?:[0-9a-fA-F]{2})*$/, "expected 0x-prefixed even-length hex"),
  v.transform(hexToBytes),
);

export const digestSchema = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte hex digest"),
  v.transform(hexToBytes),
);

const indexSchema = v.pipe(v.number(), v.integer(), v.minValue(0));

export const trieProofSchema = v.object({
  key: hexBytesSchema,
  nodes: v.array(hexBytesSchema),
});

export const headerProofSchema = v.object({
  headerDigest: digestSchema,
  positionIndex: indexSchema,
  siblingHashes: v.array(digestSchema),
});

/* wire shape of submitDeposit: every byte field hex encoded */
export const depositRequestSchema = v.object({
  checkpointId: v.pipe(indexSchema, v.transform(asCheckpointId)),
  header: hexBytesSchema,
  headerInclusionProof: headerProofSchema,
  txBytes: hexBytesSchema,
  txProof: trieProofSchema,
  receiptBytes: hexBytesSchema,
  receiptProof: trieProofSchema,
});

export type DepositRequest = v.InferOutput<typeof depositRequestSchema>;
export type DepositRequestJson = v.InferInput<typeof depositRequestSchema>;
