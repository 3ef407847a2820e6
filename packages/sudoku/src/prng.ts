import { randomBytes } from "node:crypto";
import { InvalidConfigurationError } from "./errors.js";

/** A 64-bit integer seed, or any string hashed down to one. */
export type Seed = bigint | string;

const MASK_64 = (1n << 64n) - 1n;

function splitmix64(seed: bigint): bigint {
  let z = (seed + 0x9e3779b97f4a7c15n) & MASK_64;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return z ^ (z >> 31n);
}

function fnv1a64(s: string): bigint {
  let hash = 0xcbf29ce484222325n;
  for (let i = 0; i < s.length; i++) {
    hash ^= BigInt(s.charCodeAt(i));
    hash = (hash * 0x100000001b3n) & MASK_64;
  }
  return hash;
}

/**
 * Deterministic seeded PRNG using xorshift64*.
 * The 64-bit seed is scrambled through splitmix64 so that small or
 * similar seeds still start from well-mixed states.
 */
export class SeededRng {
  private state: bigint;

  constructor(seed: Seed) {
    const raw = typeof seed === "string" ? fnv1a64(seed) : BigInt.asUintN(64, seed);
    this.state = splitmix64(raw);
    if (this.state === 0n) this.state = 1n; // xorshift cannot have state 0
  }

  /** Return next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x >> 12n;
    x ^= (x << 25n) & MASK_64;
    x ^= x >> 27n;
    this.state = x;
    return Number(((x * 0x2545f4914f6cdd1dn) & MASK_64) >> 32n);
  }

  /** Return a float in [0, 1) */
  nextFloat(): number {
    return this.next() / 4294967296;
  }

  /** Return an integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /** Return an integer in [min, max) */
  nextRange(min: number, max: number): number {
    return min + this.nextInt(max - min);
  }

  /** Shuffle an array in place (Fisher-Yates) */
  shuffle<T>(arr: T[]): T[] {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
    return arr;
  }

  /** Pick one element uniformly, or undefined for an empty array */
  pick<T>(arr: readonly T[]): T | undefined {
    if (arr.length === 0) return undefined;
    return arr[this.nextInt(arr.length)];
  }
}

/** Draw a fresh 64-bit seed from the OS entropy source. */
export function randomSeed(): bigint {
  return randomBytes(8).readBigUInt64BE(0);
}

/**
 * Parse a seed given as decimal or 0x-prefixed hex text.
 * Seeds must fit in an unsigned 64-bit integer.
 */
export function parseSeed(text: string): bigint {
  const trimmed = text.trim();
  if (!/^(0x[0-9a-f]+|\d+)$/i.test(trimmed)) {
    throw new InvalidConfigurationError(`Invalid seed: "${text}"`);
  }
  const value = BigInt(trimmed);
  if (value > MASK_64) {
    throw new InvalidConfigurationError(`Seed out of 64-bit range: ${text}`);
  }
  return value;
}
