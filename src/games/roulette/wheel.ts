import { RNG, cryptoRNG } from '../../util/rng.js';
import type { Color, SpinOutcome, Wheel } from './types.js';

export const POCKETS = 37; // single zero, 0..36

const REDS: ReadonlySet<number> = new Set([1, 3, 5, 7, 9, 12, 14, 16, 18, 19, 21, 23, 25, 27, 30, 32, 34, 36]);

export function isPocket(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n < POCKETS;
}

export function colorOf(n: number): Color {
  if (!isPocket(n)) throw new RangeError(`Not a pocket: ${n}`);
  if (n === 0) return 'green';
  return REDS.has(n) ? 'red' : 'black';
}

export function outcomeOf(value: number): SpinOutcome {
  return { value, color: colorOf(value) };
}

export function spinWheel(rng: RNG = cryptoRNG): SpinOutcome {
  return outcomeOf(rng(POCKETS));
}

export function createWheel(rng: RNG = cryptoRNG): Wheel {
  return { spin: () => spinWheel(rng) };
}
