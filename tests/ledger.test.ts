import { describe, it, expect } from "vitest";
import type { Result } from "../src/core/errors";
import { DEFAULT_CHILD_BLOCK_INTERVAL, DepositLedger, type LedgerOptions } from "../src/core/ledger";
import { MemoryTokenRegistry, denyListClassifier } from "../src/core/registry";
import type { Address, DepositFact } from "../src/core/types";
import { OTHER_TOKEN, TOKEN, addressOf, key } from "./helpers/chain";

const ROOT_TOKEN: Address = "0x00000000000000000000000000000000000000a0";
const OWNER = addressOf(key(1));
const PROGRAM: Address = "0x0000000000000000000000000000000000c0de00";

/* facts are normally minted by the validator */
const fact = (seed: number, over: Partial<{ owner: Address; token: Address; amount: bigint }> = {}) =>
  ({
    owner: OWNER,
    token: TOKEN,
    amount: 100n,
    sourceTxDigest: new Uint8Array(32).fill(seed),
    ...over,
  }) as DepositFact;

const ledger = (opts: Partial<LedgerOptions> = {}) =>
  new DepositLedger({
    tokens: new MemoryTokenRegistry([[ROOT_TOKEN, TOKEN]]),
    childBlockInterval: 4n,
    now: () => 77n,
    ...opts,
  });

const kind = (r: Result<unknown>) => (r.ok ? "ok" : r.error.kind);

describe("DepositLedger", () => {
  it("starts with an open period one interval in", () => {
    const l = ledger({ childBlockInterval: undefined });
    expect(l.childBlockInterval).toBe(DEFAULT_CHILD_BLOCK_INTERVAL);
    expect(l.periodHeaderRef).toBe(10_000n);
    expect(l.depositCount).toBe(1n);
    expect(l.status).toBe("open");
    expect(l.remainingCapacity).toBe(9_999n);
    expect(l.createDeposit(fact(1), 10_000n)).toEqual({ ok: true, value: 1n });
  });

  it("refuses unusable intervals and refs", () => {
    expect(() => ledger({ childBlockInterval: 1n })).toThrow(RangeError);
    expect(() => ledger({ initialPeriodHeaderRef: 3n })).toThrow(RangeError);
  });

  it("records the slot and consumes the source digest", () => {
    const l = ledger();
    const r = l.createDeposit(fact(1), 4n);
    expect(r).toEqual({ ok: true, value: 1n });
    expect(l.getSlot(1n)).toEqual({ periodHeaderRef: 4n, owner: OWNER, token: TOKEN, amount: 100n, createdAt: 77n });
    expect(l.isConsumed(new Uint8Array(32).fill(1))).toBe(true);
    expect(l.depositCount).toBe(2n);
  });

  it("holds interval - 1 deposits per period", () => {
    const l = ledger();
    const slots = [1, 2, 3].map((s) => l.createDeposit(fact(s), 4n));
    expect(slots.map((r) => (r.ok ? r.value : undefined))).toEqual([1n, 2n, 3n]);
    expect(l.remainingCapacity).toBe(0n);

    expect(kind(l.createDeposit(fact(4), 4n))).toBe("PeriodFull");
    expect(l.depositCount).toBe(4n);
    expect(l.isConsumed(new Uint8Array(32).fill(4))).toBe(false);
  });

  it("restarts numbering when the next period opens", () => {
    const l = ledger();
    [1, 2, 3].forEach((s) => l.createDeposit(fact(s), 4n));
    expect(l.finalizeCommit()).toEqual({ ok: true, value: 8n });
    expect(l.depositCount).toBe(1n);
    expect(l.createDeposit(fact(4), 8n)).toEqual({ ok: true, value: 5n });
  });

  it("only moves periods forward by at least one interval", () => {
    const l = ledger();
    expect(kind(l.finalizeCommit(7n))).toBe("OutOfRange");
    expect(l.periodHeaderRef).toBe(4n);
    expect(l.finalizeCommit(20n)).toEqual({ ok: true, value: 20n });
    expect(l.createDeposit(fact(1), 20n)).toEqual({ ok: true, value: 17n });
  });

  it("rejects zero amounts without using a slot", () => {
    const l = ledger();
    expect(kind(l.createDeposit(fact(1, { amount: 0n }), 4n))).toBe("ZeroAmount");
    expect(l.depositCount).toBe(1n);
    expect(l.isConsumed(new Uint8Array(32).fill(1))).toBe(false);
  });

  it("rejects a replayed source transaction, across periods too", () => {
    const l = ledger();
    expect(kind(l.createDeposit(fact(1), 4n))).toBe("ok");
    expect(kind(l.createDeposit(fact(1), 4n))).toBe("ReplayedProof");
    l.finalizeCommit();
    expect(kind(l.createDeposit(fact(1), 8n))).toBe("ReplayedProof");
    expect(l.depositCount).toBe(1n);
  });

  it("rejects unmapped tokens", () => {
    expect(kind(ledger().createDeposit(fact(1, { token: OTHER_TOKEN }), 4n))).toBe("TokenNotMapped");
  });

  it("rejects program owners when a classifier is set", () => {
    const l = ledger({ classifier: denyListClassifier([PROGRAM]) });
    expect(kind(l.createDeposit(fact(1, { owner: PROGRAM }), 4n))).toBe("NotAContractCheck");
    expect(kind(l.createDeposit(fact(2), 4n))).toBe("ok");
  });

  it("accepts program owners without a classifier", () => {
    expect(kind(ledger().createDeposit(fact(1, { owner: PROGRAM }), 4n))).toBe("ok");
  });

  it("rejects deposits while closed until the next period opens", () => {
    const l = ledger();
    l.close();
    expect(l.status).toBe("closed");
    expect(l.remainingCapacity).toBe(0n);
    expect(kind(l.createDeposit(fact(1), 4n))).toBe("PeriodClosed");
    expect(l.open()).toEqual({ ok: true, value: 8n });
    expect(kind(l.createDeposit(fact(1), 8n))).toBe("ok");
  });

  it("rejects deposits against a period that is not open", () => {
    const l = ledger();
    expect(kind(l.createDeposit(fact(1), 8n))).toBe("StalePeriod");
    l.finalizeCommit();
    expect(kind(l.createDeposit(fact(1), 4n))).toBe("StalePeriod");
  });

  it("checks period state before the fact itself", () => {
    const l = ledger();
    expect(kind(l.createDeposit(fact(1, { amount: 0n, token: OTHER_TOKEN }), 4n))).toBe("ZeroAmount");
    l.close();
    expect(kind(l.createDeposit(fact(1, { amount: 0n }), 4n))).toBe("PeriodClosed");
  });
});
