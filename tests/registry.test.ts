import { describe, it, expect } from "vitest";
import { MemoryCheckpointSource, MemoryTokenRegistry, denyListClassifier } from "../src/core/registry";
import { asCheckpointId } from "../src/types/brands";
import type { Checkpoint } from "../src/core/types";

const cp = (id: number, startNumber: bigint, endNumber: bigint, root = new Uint8Array(32).fill(id + 1)): Checkpoint => ({
  id: asCheckpointId(id),
  startNumber,
  endNumber,
  root,
  committedAt: 0n,
});

describe("MemoryCheckpointSource", () => {
  it("records contiguous checkpoints in id order", () => {
    const source = new MemoryCheckpointSource();
    expect(source.nextStart()).toBeUndefined();
    source.record(cp(0, 1n, 64n));
    source.record(cp(1, 65n, 65n));
    expect(source.nextStart()).toBe(66n);
    expect(source.getCheckpoint(asCheckpointId(1))?.startNumber).toBe(65n);
    expect(source.getCheckpoint(asCheckpointId(2))).toBeUndefined();
  });

  it("rejects ids out of sequence", () => {
    const source = new MemoryCheckpointSource();
    expect(() => source.record(cp(1, 1n, 2n))).toThrow("checkpoint id 1, expected 0");
  });

  it("rejects gaps and overlaps", () => {
    const source = new MemoryCheckpointSource();
    source.record(cp(0, 10n, 19n));
    expect(() => source.record(cp(1, 21n, 30n))).toThrow(RangeError);
    expect(() => source.record(cp(1, 19n, 30n))).toThrow(RangeError);
    source.record(cp(1, 20n, 30n));
  });

  it("rejects inverted ranges and short roots", () => {
    const source = new MemoryCheckpointSource();
    expect(() => source.record(cp(0, 5n, 4n))).toThrow("start 5 > end 4");
    expect(() => source.record(cp(0, 1n, 4n, new Uint8Array(20)))).toThrow("root must be 32 bytes");
  });
});

describe("MemoryTokenRegistry", () => {
  it("maps child tokens to root tokens regardless of case", () => {
    const tokens = new MemoryTokenRegistry([
      ["0x00000000000000000000000000000000000000aa", "0x00000000000000000000000000000000000000BB"],
    ]);
    expect(tokens.isTokenMapped("0x00000000000000000000000000000000000000bb")).toBe(true);
    expect(tokens.isTokenMapped("0x00000000000000000000000000000000000000aa")).toBe(false);
    expect(tokens.rootTokenOf("0x00000000000000000000000000000000000000Bb")).toBe(
      "0x00000000000000000000000000000000000000aa",
    );
  });
});

describe("denyListClassifier", () => {
  it("flags listed programs only", () => {
    const classifier = denyListClassifier(["0x000000000000000000000000000000000000C0DE"]);
    expect(classifier.isPlainAccount("0x000000000000000000000000000000000000c0de")).toBe(false);
    expect(classifier.isPlainAccount("0x0000000000000000000000000000000000000001")).toBe(true);
  });
});
