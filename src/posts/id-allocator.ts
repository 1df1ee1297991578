export type IdStrategy = "sequential" | "random";

export interface IdAllocator {
  allocate(isTaken: (id: number) => boolean): number;
}

export class SequentialIdAllocator implements IdAllocator {
  private nextId: number;

  constructor(start = 1) {
    if (!Number.isSafeInteger(start) || start <= 0) {
      throw new RangeError("start must be a positive integer");
    }
    this.nextId = start;
  }

  allocate(isTaken: (id: number) => boolean): number {
    while (isTaken(this.nextId)) {
      this.nextId += 1;
    }

    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}

export interface RandomIdAllocatorOptions {
  min?: number;
  max?: number;
  maxAttempts?: number;
  random?: () => number;
}

const DEFAULT_RANDOM_MIN = 3;
const DEFAULT_RANDOM_MAX = 1_000_000;
const DEFAULT_MAX_ATTEMPTS = 32;

/**
 * Draws ids uniformly from `[min, max]`. After `maxAttempts` collisions in a
 * row it hands out ids from a counter above `max`, so allocation always ends.
 */
export class RandomIdAllocator implements IdAllocator {
  private readonly min: number;
  private readonly max: number;
  private readonly maxAttempts: number;
  private readonly random: () => number;
  private readonly overflow: SequentialIdAllocator;

  constructor(options: RandomIdAllocatorOptions = {}) {
    const min = options.min ?? DEFAULT_RANDOM_MIN;
    const max = options.max ?? DEFAULT_RANDOM_MAX;

    // max + 1 seeds the overflow counter, so it must stay a safe integer too.
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max + 1) || min <= 0 || min > max) {
      throw new RangeError("min and max must be positive integers with min <= max < Number.MAX_SAFE_INTEGER");
    }

    this.min = min;
    this.max = max;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.random = options.random ?? Math.random;
    this.overflow = new SequentialIdAllocator(max + 1);
  }

  allocate(isTaken: (id: number) => boolean): number {
    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      const candidate = this.min + Math.floor(this.random() * (this.max - this.min + 1));
      if (!isTaken(candidate)) {
        return candidate;
      }
    }

    return this.overflow.allocate(isTaken);
  }
}

export function createIdAllocator(strategy: IdStrategy): IdAllocator {
  return strategy === "random" ? new RandomIdAllocator() : new SequentialIdAllocator();
}
