import { ValidationError } from '../ledger/errors';

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Pseudo-random source threaded through every sampling call. Never held as
 * module state: two runs with equal seeds must see equal streams.
 */
export interface Rand {
  /** Float in [0, 1). */
  next(): number;
  /** Integer in [0, n). */
  intn(n: number): number;
}

/**
 * Mulberry32. Small, fast and fully reproducible from a 32-bit seed.
 */
export class SeededRand implements Rand {
  private state: number;

  constructor(seed: number) {
    if (!Number.isFinite(seed)) {
      throw new ValidationError('seed must be a finite number');
    }
    this.state = Math.trunc(seed) >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  intn(n: number): number {
    if (!Number.isSafeInteger(n) || n <= 0) {
      throw new ValidationError(`intn bound must be a positive integer, got ${n}`);
    }
    return Math.floor(this.next() * n);
  }
}

export function randStringOfLength(r: Rand, n: number): string {
  let out = '';
  for (let i = 0; i < n; i += 1) {
    out += LETTERS[r.intn(LETTERS.length)];
  }
  return out;
}

/** Integer in [min, max). */
export function randIntBetween(r: Rand, min: number, max: number): number {
  if (max <= min) {
    throw new ValidationError(`empty range [${min}, ${max})`);
  }
  return min + r.intn(max - min);
}

/** Integer in [1, max]. */
export function randPositiveInt(r: Rand, max: number): number {
  if (!Number.isSafeInteger(max) || max < 1) {
    throw new ValidationError(`max too small: ${max}`);
  }
  return 1 + r.intn(max);
}

/** A random permutation of [0, n). */
export function perm(r: Rand, n: number): number[] {
  const out = new Array<number>(n);
  for (let i = 0; i < n; i += 1) {
    const j = r.intn(i + 1);
    out[i] = out[j];
    out[j] = i;
  }
  return out;
}

export function pick<T>(r: Rand, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[r.intn(items.length)];
}

export function randBytes(r: Rand, n: number): Uint8Array {
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i += 1) {
    out[i] = r.intn(256);
  }
  return out;
}
