import { nanoid } from 'nanoid';
import type { ScopedLog } from '../../cli/logger.js';
import { DEFAULT_STAKE } from '../../config/runtime.js';
import { isPromptAbort, promptUntilValid, type Terminal } from '../../interactions/terminal.js';
import { formatMoney, roundMoney } from '../../economy/currency.js';
import { landedMessage, outcomeMessage } from '../../ui/outcome.js';
import { createBet, resolveBet } from './engine.js';
import { InvalidBetError, SessionStateError } from './errors.js';
import { parseBetAmount, parseBetKind, parseColor, parseParity, parsePocket } from './input.js';
import type { Bet, EndReason, RoundRecord, SessionState, SessionSummary, SpinOutcome, Wheel } from './types.js';

export const PROMPTS = {
  amount: 'Enter bet amount (or 0 to cash out): ',
  kind: 'Choose bet type (number/color/parity): ',
  number: 'Pick a number between 0 and 36: ',
  color: 'Pick a color (red/black): ',
  parity: 'Pick parity (even/odd): ',
} as const;

/**
 * One player at the table.
 *
 * awaiting_bet -> resolving (placeBet) -> awaiting_bet (settle), until
 * cashOut, an empty balance (checkBroke) or interrupt moves it to terminated.
 */
export class RouletteSession {
  readonly id: string;
  readonly stake: number;
  private _balance: number;
  private _state: SessionState = 'awaiting_bet';
  private _endReason?: EndReason;
  private pending?: Bet;
  private readonly history: RoundRecord[] = [];

  constructor(stake: number = DEFAULT_STAKE, id: string = nanoid(10)) {
    const start = roundMoney(stake);
    if (!Number.isFinite(start) || start <= 0) throw new RangeError(`Stake must be positive, got ${stake}`);
    this.id = id;
    this.stake = start;
    this._balance = start;
  }

  get balance(): number { return this._balance; }
  get state(): SessionState { return this._state; }
  get endReason(): EndReason | undefined { return this._endReason; }
  get rounds(): readonly RoundRecord[] { return this.history; }

  placeBet(bet: Bet): void {
    if (this._state !== 'awaiting_bet') throw new SessionStateError('place a bet', this._state);
    if (!(bet.amount > 0 && bet.amount <= this._balance)) {
      throw new InvalidBetError(`Bet of ${formatMoney(bet.amount)} must be above zero and within ${formatMoney(this._balance)}`);
    }
    this.pending = bet;
    this._state = 'resolving';
  }

  settle(outcome: SpinOutcome): RoundRecord {
    const bet = this.pending;
    if (this._state !== 'resolving' || !bet) throw new SessionStateError('settle', this._state);
    const profit = resolveBet(bet, outcome);
    this._balance = roundMoney(this._balance + profit);
    const record: RoundRecord = { round: this.history.length + 1, bet, outcome, profit, balance: this._balance };
    this.history.push(record);
    this.pending = undefined;
    this._state = 'awaiting_bet';
    return record;
  }

  cashOut(): void {
    if (this._state !== 'awaiting_bet') throw new SessionStateError('cash out', this._state);
    this.terminate('cash_out');
  }

  /** Ends the session when it is waiting for a bet with nothing left to stake. */
  checkBroke(): boolean {
    if (this._state === 'awaiting_bet' && this._balance <= 0) this.terminate('broke');
    return this._state === 'terminated';
  }

  interrupt(): void {
    if (this._state === 'terminated') return;
    this.pending = undefined;
    this.terminate('interrupted');
  }

  summary(): SessionSummary {
    if (this._state !== 'terminated' || !this._endReason) throw new SessionStateError('summarize', this._state);
    const profits = this.history.map((r) => r.profit);
    return {
      endReason: this._endReason,
      stake: this.stake,
      balance: this._balance,
      net: roundMoney(this._balance - this.stake),
      rounds: this.history.length,
      wins: profits.filter((p) => p > 0).length,
      losses: profits.filter((p) => p < 0).length,
      biggestWin: Math.max(0, ...profits),
    };
  }

  private terminate(reason: EndReason) {
    this._state = 'terminated';
    this._endReason = reason;
  }
}

export function playRound(session: RouletteSession, bet: Bet, wheel: Wheel): RoundRecord {
  session.placeBet(bet);
  return session.settle(wheel.spin());
}

async function promptBet(terminal: Terminal, amount: number): Promise<Bet> {
  const kind = await promptUntilValid(terminal, PROMPTS.kind, parseBetKind);
  switch (kind) {
    case 'number':
      return createBet('number', await promptUntilValid(terminal, PROMPTS.number, parsePocket), amount);
    case 'color':
      return createBet('color', await promptUntilValid(terminal, PROMPTS.color, parseColor), amount);
    case 'parity':
      return createBet('parity', await promptUntilValid(terminal, PROMPTS.parity, parseParity), amount);
  }
}

export type SessionDeps = {
  terminal: Terminal;
  wheel: Wheel;
  log?: ScopedLog;
};

/**
 * Drives the session until it terminates and reports every step to the
 * terminal. A closed or interrupted prompt ends the session as `interrupted`.
 */
export async function runSession(session: RouletteSession, { terminal, wheel, log }: SessionDeps): Promise<SessionSummary> {
  terminal.say('=== Welcome to CLI Roulette ===', 'title');
  try {
    while (!session.checkBroke()) {
      terminal.say('');
      terminal.say(`Current balance: ${formatMoney(session.balance)}`);
      const amount = await promptUntilValid(terminal, PROMPTS.amount, (raw) => parseBetAmount(raw, session.balance));
      if (amount === 0) {
        session.cashOut();
        break;
      }
      const bet = await promptBet(terminal, amount);

      terminal.say('Spinning the wheel...', 'dim');
      const record = playRound(session, bet, wheel);
      terminal.say(landedMessage(record.outcome));
      if (record.profit >= 0) terminal.say(outcomeMessage('win', record.profit), 'success');
      else terminal.say(outcomeMessage('loss', record.profit), 'error');

      log?.info('round_settled', {
        session: session.id,
        round: record.round,
        bet: record.bet,
        outcome: record.outcome,
        profit: record.profit,
        balance: record.balance,
      });
    }
  } catch (err) {
    if (!isPromptAbort(err)) throw err;
    log?.warn('session_interrupted', { session: session.id, code: err.code });
    session.interrupt();
  }

  const summary = session.summary();
  terminal.say('');
  terminal.say(outcomeMessage(summary.endReason, summary.balance), 'title');
  log?.info('session_end', { session: session.id, reason: summary.endReason, balance: summary.balance, rounds: summary.rounds });
  return summary;
}
