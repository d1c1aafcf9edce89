import * as v from "valibot";
import { fail, type Result } from "./errors";
import { DepositLedger } from "./ledger";
import { validate } from "./validator";
import { makeLogger, type ILogger } from "../logging";
import { depositRequestSchema } from "../schema";
import type { Config } from "../config";
import type { CheckpointId, SlotId } from "../types/brands";
import type {
  AccountClassifier,
  CheckpointSource,
  EventDecoder,
  HeaderInclusionProof,
  LeafScheme,
  ProofBundle,
  TokenRegistry,
} from "./types";

/** Trie proof as a caller supplies it; the value travels separately. */
export type TrieProofInput = { key: Uint8Array; nodes: readonly Uint8Array[] };

export type BridgeOptions = {
  checkpoints: CheckpointSource;
  ledger: DepositLedger;
  leafScheme?: LeafScheme;
  decodeEvent?: EventDecoder;
  logger?: ILogger;
};

/* ──────────── caller-facing entry point ──────────── */
export class Bridge {
  private readonly checkpoints: CheckpointSource;
  readonly ledger: DepositLedger;
  private readonly leafScheme: LeafScheme;
  private readonly decodeEvent?: EventDecoder;
  private readonly log: ILogger;

  constructor(opts: BridgeOptions) {
    this.checkpoints = opts.checkpoints;
    this.ledger = opts.ledger;
    this.leafScheme = opts.leafScheme ?? "block-hash";
    this.decodeEvent = opts.decodeEvent;
    this.log = (opts.logger ?? makeLogger("silent")).child({ component: "bridge" });
  }

  submitDeposit(
    checkpointId: CheckpointId,
    header: Uint8Array,
    headerInclusionProof: HeaderInclusionProof,
    txBytes: Uint8Array,
    txProof: TrieProofInput,
    receiptBytes: Uint8Array,
    receiptProof: TrieProofInput,
  ): Result<SlotId> {
    return this.submitBundle({
      checkpointId,
      header,
      headerInclusionProof,
      txProof: { ...txProof, valueBytes: txBytes },
      receiptProof: { ...receiptProof, valueBytes: receiptBytes },
    });
  }

  submitBundle(bundle: ProofBundle): Result<SlotId> {
    const checkpoint = this.checkpoints.getCheckpoint(bundle.checkpointId);
    if (!checkpoint) {
      this.log.warn({ checkpointId: bundle.checkpointId }, "unknown checkpoint");
      return fail("UnknownCheckpoint", `checkpoint ${bundle.checkpointId} not recorded`);
    }

    const fact = validate(bundle, checkpoint, {
      leafScheme: this.leafScheme,
      decodeEvent: this.decodeEvent,
    });
    if (!fact.ok) {
      this.log.warn({ checkpointId: checkpoint.id, kind: fact.error.kind }, fact.error.message);
      return fact;
    }
    this.log.debug({ checkpointId: checkpoint.id, owner: fact.value.owner }, "proof bundle verified");

    return this.ledger.createDeposit(fact.value, this.ledger.periodHeaderRef);
  }

  /** Same as submitDeposit, from a hex-encoded request body. */
  submitDepositJson(input: unknown): Result<SlotId> {
    const parsed = v.safeParse(depositRequestSchema, input);
    if (!parsed.success) {
      const detail = parsed.issues.map((i) => `${v.getDotPath(i) ?? "request"}: ${i.message}`).join("; ");
      this.log.warn({ kind: "MalformedEncoding" }, detail);
      return fail("MalformedEncoding", `deposit request: ${detail}`);
    }
    const r = parsed.output;
    return this.submitDeposit(
      r.checkpointId,
      r.header,
      r.headerInclusionProof,
      r.txBytes,
      r.txProof,
      r.receiptBytes,
      r.receiptProof,
    );
  }
}

export type BridgeDeps = {
  checkpoints: CheckpointSource;
  tokens: TokenRegistry;
  classifier?: AccountClassifier;
  decodeEvent?: EventDecoder;
  now?: () => bigint;
};

/** Wire a bridge from loaded configuration. */
export const createBridge = (config: Config, deps: BridgeDeps): Bridge => {
  if (config.requirePlainAccount && !deps.classifier) {
    throw new Error("REQUIRE_PLAIN_ACCOUNT is set but no account classifier was supplied");
  }
  const logger = makeLogger(config.logLevel, { pretty: config.logPretty });
  const ledger = new DepositLedger({
    tokens: deps.tokens,
    childBlockInterval: config.childBlockInterval,
    classifier: config.requirePlainAccount ? deps.classifier : undefined,
    now: deps.now,
    logger,
  });
  return new Bridge({
    checkpoints: deps.checkpoints,
    ledger,
    leafScheme: config.leafScheme,
    decodeEvent: deps.decodeEvent,
    logger,
  });
};
