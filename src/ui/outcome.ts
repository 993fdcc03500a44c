import { formatMoney } from '../economy/currency.js';
import type { EndReason, SpinOutcome } from '../games/roulette/types.js';

export type Outcome = 'win' | 'loss' | EndReason;

export function outcomeMessage(kind: Outcome, amount = 0): string {
  switch (kind) {
    case 'win':
      return `You won ${formatMoney(amount)}!`;
    case 'loss':
      return `You lost ${formatMoney(Math.abs(amount))}.`;
    case 'cash_out':
      return `You leave the table with ${formatMoney(amount)}. Thanks for playing!`;
    case 'broke':
      return `You leave the table with ${formatMoney(amount)}. Better luck next time!`;
    case 'interrupted':
      return `Game aborted. You leave with ${formatMoney(amount)}. See you next time!`;
  }
}

export function landedMessage(outcome: SpinOutcome): string {
  return `The ball landed on ${outcome.value} (${outcome.color}).`;
}
