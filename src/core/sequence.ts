/**
 * Generalized Fibonacci sequence.
 * @module sequence
 *
 * Stateless. Term 0 is `a`, term 1 is `b`, each later term is the sum of the
 * two before it. Blocks chain: the last two terms of one block seed the next.
 */

import { InvalidLengthError, InvalidSeedError } from './errors';
import type { SeedPair } from './state';

function assertSeed(a: bigint, b: bigint): void {
  if (a < 0n || b < a) {
    throw new InvalidSeedError(a, b);
  }
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidLengthError(`Length must be a positive integer: ${length}`);
  }
}

/**
 * Value of a single term.
 * @param n - Zero-based term index
 * @param a - Term 0
 * @param b - Term 1
 * @throws InvalidLengthError when n is negative or not an integer
 * @throws InvalidSeedError when a < 0 or b < a
 */
export function valueAt(n: number, a: bigint, b: bigint): bigint {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidLengthError(`Term must be a non-negative integer: ${n}`);
  }
  assertSeed(a, b);

  if (n === 0) return a;
  if (n === 1) return b;
  // a <= b, so the whole sequence is zero
  if (b === 0n) return 0n;

  let prev = a;
  let last = b;
  for (let i = 2; i <= n; i++) {
    const next = prev + last;
    prev = last;
    last = next;
  }
  return last;
}

/**
 * The first `length` terms of the sequence seeded by `(a, b)`.
 */
export function seedBlock(length: number, a: bigint, b: bigint): bigint[] {
  assertLength(length);
  assertSeed(a, b);

  const block: bigint[] = [a];
  if (length >= 2) block.push(b);

  let prev = a;
  let last = b;
  for (let i = 2; i < length; i++) {
    const next = prev + last;
    prev = last;
    last = next;
    block.push(next);
  }
  return block;
}

/**
 * The `length` terms that follow `(a, b)`. The first one is `a + b`.
 */
export function continuationBlock(length: number, a: bigint, b: bigint): bigint[] {
  assertLength(length);
  assertSeed(a, b);

  const block: bigint[] = [];
  let prev = a;
  let last = b;
  for (let i = 0; i < length; i++) {
    const next = prev + last;
    prev = last;
    last = next;
    block.push(next);
  }
  return block;
}

/** Last two terms of a block, as the seed for the next call. */
export function nextSeed(block: readonly bigint[]): SeedPair {
  if (block.length < 2) {
    throw new InvalidLengthError(`A block needs at least two terms to seed the next one: ${block.length}`);
  }
  return { a: block[block.length - 2], b: block[block.length - 1] };
}

/**
 * Cut a block at the first term above the ceiling.
 * `null` ceiling means unbounded.
 */
export function truncateAtCeiling(
  block: readonly bigint[],
  ceiling: bigint | null
): { terms: bigint[]; truncated: boolean } {
  if (ceiling === null) return { terms: [...block], truncated: false };

  const index = block.findIndex((term) => term > ceiling);
  if (index === -1) return { terms: [...block], truncated: false };
  return { terms: block.slice(0, index), truncated: true };
}
