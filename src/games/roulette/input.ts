// Raw terminal input -> bet pieces. Parsers never throw; an error carries the
// line shown to the player before the question is asked again.

import { formatMoney, roundMoney } from '../../economy/currency.js';
import { BET_KINDS } from './engine.js';
import { POCKETS } from './wheel.js';
import type { BetColor, BetKind, Parity } from './types.js';

export type ParseOk<T> = { value: T };

export type ParseErr =
  | { code: 'not_a_number'; raw: string; message: string }
  | { code: 'not_an_integer'; raw: string; message: string }
  | { code: 'out_of_range'; raw: string; message: string }
  | { code: 'bad_choice'; raw: string; message: string };

export type ParseResult<T> = ParseOk<T> | ParseErr;

export type Parser<T> = (raw: string) => ParseResult<T>;

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER = /^[+-]?\d+$/;

/** Bet amount in [0, balance], range-checked as typed, then rounded to cents. 0 means cash out. */
export function parseBetAmount(raw: string, balance: number): ParseResult<number> {
  const s = raw.trim();
  if (!NUMERIC.test(s)) return { code: 'not_a_number', raw, message: 'Please enter a number.' };
  const n = Number(s);
  if (!Number.isFinite(n) || n < 0 || n > balance) {
    return { code: 'out_of_range', raw, message: `Enter a value between 0 and ${formatMoney(balance)}.` };
  }
  const value = roundMoney(n);
  return { value: value === 0 ? 0 : value };
}

export function parsePocket(raw: string): ParseResult<number> {
  const s = raw.trim();
  if (!INTEGER.test(s)) return { code: 'not_an_integer', raw, message: 'Please enter an integer.' };
  const value = parseInt(s, 10);
  if (value < 0 || value >= POCKETS) {
    return { code: 'out_of_range', raw, message: `Number must be between 0 and ${POCKETS - 1}.` };
  }
  return { value };
}

export function choiceParser<T extends string>(choices: readonly T[]): Parser<T> {
  return (raw: string) => {
    const s = raw.trim().toLowerCase();
    const value = choices.find((c) => c.toLowerCase() === s);
    if (value !== undefined) return { value };
    return { code: 'bad_choice', raw, message: `Invalid choice. Pick from: ${choices.join(', ')}` };
  };
}

export const parseBetKind: Parser<BetKind> = choiceParser(BET_KINDS);
export const parseColor: Parser<BetColor> = choiceParser<BetColor>(['red', 'black']);
export const parseParity: Parser<Parity> = choiceParser<Parity>(['even', 'odd']);
