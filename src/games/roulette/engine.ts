import { roundMoney } from '../../economy/currency.js';
import { InvalidBetError, InvalidBetKindError } from './errors.js';
import { isPocket } from './wheel.js';
import type { Bet, BetKind, BetValue, Parity, SpinOutcome } from './types.js';

// Profit per unit staked on a win
export const PAYOUTS: Readonly<Record<BetKind, number>> = {
  number: 35,
  color: 1,
  parity: 1,
};

export const BET_KINDS: readonly BetKind[] = ['number', 'color', 'parity'];

/** Zero has no parity for betting purposes. */
export function parityOf(n: number): Parity | null {
  if (n === 0) return null;
  return n % 2 === 0 ? 'even' : 'odd';
}

export function isWinningBet(bet: Bet, outcome: SpinOutcome): boolean {
  switch (bet.kind) {
    case 'number':
      return bet.value === outcome.value;
    case 'color':
      return bet.value === outcome.color;
    case 'parity':
      return parityOf(outcome.value) === bet.value;
    default:
      return unknownKind(bet);
  }
}

/**
 * Profit of a single bet against a spin: `amount * payout` on a win,
 * `-amount` otherwise. Green loses every color and parity bet.
 */
export function resolveBet(bet: Bet, outcome: SpinOutcome): number {
  const { amount } = bet;
  return isWinningBet(bet, outcome) ? amount * PAYOUTS[bet.kind] : -amount;
}

export function createBet<K extends BetKind>(kind: K, value: BetValue<K>, amount: number): Extract<Bet, { kind: K }>;
export function createBet(kind: BetKind, value: number | string, amount: number): Bet {
  if (!Number.isFinite(amount) || roundMoney(amount) <= 0) {
    throw new InvalidBetError(`Bet amount must be positive, got ${amount}`);
  }
  const stake = roundMoney(amount);
  switch (kind) {
    case 'number':
      if (typeof value !== 'number' || !isPocket(value)) throw new InvalidBetError(`Number bet must be 0-36, got ${value}`);
      return { kind, value, amount: stake };
    case 'color':
      if (value !== 'red' && value !== 'black') throw new InvalidBetError(`Color bet must be red or black, got ${value}`);
      return { kind, value, amount: stake };
    case 'parity':
      if (value !== 'even' && value !== 'odd') throw new InvalidBetError(`Parity bet must be even or odd, got ${value}`);
      return { kind, value, amount: stake };
    default:
      return unknownKind(kind);
  }
}

function unknownKind(detail: never): never {
  throw new InvalidBetKindError(JSON.stringify(detail));
}
