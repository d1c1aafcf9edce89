import { fail, ok, type ErrorKind, type Result } from "./errors";
import { silentLogger, type ILogger } from "../logging";
import { asSlotId, type SlotId } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import type {
  AccountClassifier,
  DepositFact,
  DepositSlot,
  PeriodStatus,
  TokenRegistry,
} from "./types";

export const DEFAULT_CHILD_BLOCK_INTERVAL = 10_000n;

export type LedgerOptions = {
  tokens: TokenRegistry;
  childBlockInterval?: bigint;
  /** header ref of the first open period; defaults to one interval */
  initialPeriodHeaderRef?: bigint;
  /** omit to accept deposits from any address */
  classifier?: AccountClassifier;
  now?: () => bigint;
  logger?: ILogger;
};

const unixNow = (): bigint => BigInt(Math.floor(Date.now() / 1000));

/**
 * Root-side deposit accounting.
 *
 * Each commit period hands out slot ids
 * `periodHeaderRef - interval + depositCount` for depositCount in
 * 1..interval-1. Periods move forward only through finalizeCommit; a source
 * transaction digest can be credited once over the ledger's lifetime.
 * Every operation either applies fully or leaves the ledger as it was.
 */
export class DepositLedger {
  readonly childBlockInterval: bigint;
  private readonly tokens: TokenRegistry;
  private readonly classifier?: AccountClassifier;
  private readonly now: () => bigint;
  private readonly log: ILogger;

  private _status: PeriodStatus = "open";
  private _periodHeaderRef: bigint;
  private _depositCount = 1n;
  private readonly slots = new Map<bigint, DepositSlot>();
  private readonly consumed = new Set<string>();

  constructor(opts: LedgerOptions) {
    this.childBlockInterval = opts.childBlockInterval ?? DEFAULT_CHILD_BLOCK_INTERVAL;
    if (this.childBlockInterval < 2n) {
      throw new RangeError(`child block interval must be at least 2, got ${this.childBlockInterval}`);
    }
    this._periodHeaderRef = opts.initialPeriodHeaderRef ?? this.childBlockInterval;
    if (this._periodHeaderRef < this.childBlockInterval) {
      throw new RangeError(`period header ref ${this._periodHeaderRef} below one interval`);
    }
    this.tokens = opts.tokens;
    this.classifier = opts.classifier;
    this.now = opts.now ?? unixNow;
    this.log = (opts.logger ?? silentLogger()).child({ component: "deposit-ledger" });
  }

  get status(): PeriodStatus {
    return this._status;
  }
  get periodHeaderRef(): bigint {
    return this._periodHeaderRef;
  }
  get depositCount(): bigint {
    return this._depositCount;
  }
  get remainingCapacity(): bigint {
    return this._status === "open" ? this.childBlockInterval - this._depositCount : 0n;
  }

  getSlot(slotId: SlotId | bigint): DepositSlot | undefined {
    return this.slots.get(slotId);
  }

  isConsumed(sourceTxDigest: Uint8Array): boolean {
    return this.consumed.has(bytesToHex(sourceTxDigest));
  }

  /**
   * Open the next period. Called by the checkpoint committer; calling it
   * mid-period ends the current period early.
   */
  finalizeCommit(nextPeriodHeaderRef?: bigint): Result<bigint> {
    const next = nextPeriodHeaderRef ?? this._periodHeaderRef + this.childBlockInterval;
    // slot ranges of consecutive periods must not overlap
    if (next < this._periodHeaderRef + this.childBlockInterval) {
      return this.reject("OutOfRange", `period ref ${next} does not advance past ${this._periodHeaderRef}`);
    }
    this._periodHeaderRef = next;
    this._depositCount = 1n;
    this._status = "open";
    this.log.info({ periodHeaderRef: next }, "period opened");
    return ok(next);
  }

  open(nextPeriodHeaderRef?: bigint): Result<bigint> {
    return this.finalizeCommit(nextPeriodHeaderRef);
  }

  close(): void {
    if (this._status === "closed") return;
    this._status = "closed";
    this.log.info(
      { periodHeaderRef: this._periodHeaderRef, deposits: this._depositCount - 1n },
      "period closed",
    );
  }

  createDeposit(fact: DepositFact, periodHeaderRef: bigint): Result<SlotId> {
    if (this._status === "closed") {
      return this.reject("PeriodClosed", `period ${this._periodHeaderRef} is closed`);
    }
    if (periodHeaderRef !== this._periodHeaderRef) {
      return this.reject("StalePeriod", `period ${periodHeaderRef} is not the open period ${this._periodHeaderRef}`);
    }
    if (this.classifier && !this.classifier.isPlainAccount(fact.owner)) {
      return this.reject("NotAContractCheck", `${fact.owner} is a program address`);
    }
    if (fact.amount === 0n) {
      return this.reject("ZeroAmount", "deposit amount is zero");
    }
    if (!this.tokens.isTokenMapped(fact.token)) {
      return this.reject("TokenNotMapped", `token ${fact.token} has no mapping`);
    }
    const digest = bytesToHex(fact.sourceTxDigest);
    if (this.consumed.has(digest)) {
      return this.reject("ReplayedProof", `source tx ${digest} already credited`);
    }
    if (this._depositCount >= this.childBlockInterval) {
      return this.reject("PeriodFull", `period ${this._periodHeaderRef} holds ${this.childBlockInterval - 1n} deposits`);
    }

    const slotId = this._periodHeaderRef - this.childBlockInterval + this._depositCount;
    this.slots.set(slotId, {
      periodHeaderRef,
      owner: fact.owner,
      token: fact.token,
      amount: fact.amount,
      createdAt: this.now(),
    });
    this.consumed.add(digest);
    this._depositCount += 1n;

    this.log.info(
      { slotId: slotId.toString(), owner: fact.owner, token: fact.token, amount: fact.amount.toString() },
      "deposit slot created",
    );
    return ok(asSlotId(slotId));
  }

  private reject(kind: ErrorKind, message: string): Result<never> {
    this.log.warn({ kind }, message);
    return fail(kind, message);
  }
}
