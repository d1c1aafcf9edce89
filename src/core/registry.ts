import { DIGEST_LENGTH } from "./hash";
import type { Address, CheckpointId } from "../types/brands";
import type { AccountClassifier, Checkpoint, CheckpointSource, TokenRegistry } from "./types";

/**
 * Checkpoints as a relayer mirrors them from the root ledger. Recording keeps
 * the committed ranges contiguous; ids start at 0 and increase by one.
 */
export class MemoryCheckpointSource implements CheckpointSource {
  private readonly byId = new Map<number, Checkpoint>();
  private last?: Checkpoint;

  record(cp: Checkpoint): void {
    if (cp.startNumber > cp.endNumber) {
      throw new RangeError(`checkpoint ${cp.id}: start ${cp.startNumber} > end ${cp.endNumber}`);
    }
    if (cp.root.length !== DIGEST_LENGTH) {
      throw new RangeError(`checkpoint ${cp.id}: root must be ${DIGEST_LENGTH} bytes`);
    }
    const expectedId = this.last ? this.last.id + 1 : 0;
    if (cp.id !== expectedId) {
      throw new RangeError(`checkpoint id ${cp.id}, expected ${expectedId}`);
    }
    if (this.last && cp.startNumber !== this.last.endNumber + 1n) {
      throw new RangeError(
        `checkpoint ${cp.id} starts at ${cp.startNumber}, previous ended at ${this.last.endNumber}`,
      );
    }
    this.byId.set(cp.id, cp);
    this.last = cp;
  }

  getCheckpoint(id: CheckpointId): Checkpoint | undefined {
    return this.byId.get(id);
  }

  /** First block number the next checkpoint must start at. */
  nextStart(): bigint | undefined {
    return this.last ? this.last.endNumber + 1n : undefined;
  }
}

/* child token → root token; deposits arrive as child-chain transfers */
export class MemoryTokenRegistry implements TokenRegistry {
  private readonly byChild = new Map<Address, Address>();

  constructor(entries: Iterable<readonly [root: Address, child: Address]> = []) {
    for (const [root, child] of entries) this.mapToken(root, child);
  }

  mapToken(rootToken: Address, childToken: Address): void {
    this.byChild.set(normalize(childToken), normalize(rootToken));
  }

  isTokenMapped(token: Address): boolean {
    return this.byChild.has(normalize(token));
  }

  rootTokenOf(childToken: Address): Address | undefined {
    return this.byChild.get(normalize(childToken));
  }
}

/** Classifier over a known set of program addresses. */
export const denyListClassifier = (programs: Iterable<Address>): AccountClassifier => {
  const set = new Set([...programs].map(normalize));
  return { isPlainAccount: (a) => !set.has(normalize(a)) };
};

const normalize = (a: Address): Address => `0x${a.slice(2).toLowerCase()}`;
