import {
  xoroshiro128plus,
  unsafeUniformIntDistribution,
  type RandomGenerator,
} from "pure-rand";
import { MAX_SEED } from "@/lib/constants";

/**
 * Seeded pseudo-random source threaded through every sampling primitive.
 *
 * Each generator run owns one instance, so two runs with the same seed draw
 * the same stream regardless of what else the process is doing.
 */
export interface Random {
  readonly seed: number;
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  /** Lowercase hexadecimal string of the given length. */
  hex(length: number): string;
}

const HIGH_BITS = 2 ** 26;
const LOW_BITS = 2 ** 27;

class PureRandom implements Random {
  readonly seed: number;
  private rng: RandomGenerator;

  constructor(seed: number) {
    this.seed = seed;
    this.rng = xoroshiro128plus(seed);
  }

  next(): number {
    // 53 bits of entropy, same construction as a double mantissa
    const high = unsafeUniformIntDistribution(0, HIGH_BITS - 1, this.rng);
    const low = unsafeUniformIntDistribution(0, LOW_BITS - 1, this.rng);
    return (high * LOW_BITS + low) / (HIGH_BITS * LOW_BITS);
  }

  int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`Invalid range [${min}, ${max}]`);
    }
    return unsafeUniformIntDistribution(min, max, this.rng);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.int(0, items.length - 1)];
  }

  hex(length: number): string {
    let out = "";
    for (let i = 0; i < length; i++) {
      out += this.int(0, 15).toString(16);
    }
    return out;
  }
}

/** Seed drawn from the wall clock when the caller does not supply one. */
export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x7fffffff)) >>> 1;
}

/**
 * xoroshiro128+ keeps only the low 32 bits of its seed, so anything outside
 * [0, MAX_SEED] would silently share a stream with another seed.
 */
export function createRandom(seed: number = randomSeed()): Random {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer between 0 and ${MAX_SEED}, got ${seed}`);
  }
  return new PureRandom(seed);
}
