export type Color = 'red' | 'black' | 'green';
export type BetColor = Exclude<Color, 'green'>;
export type Parity = 'even' | 'odd';

export type NumberBet = { kind: 'number'; value: number; amount: number }; // value 0-36
export type ColorBet = { kind: 'color'; value: BetColor; amount: number };
export type ParityBet = { kind: 'parity'; value: Parity; amount: number };

export type Bet = NumberBet | ColorBet | ParityBet;
export type BetKind = Bet['kind'];
export type BetValue<K extends BetKind> = Extract<Bet, { kind: K }>['value'];

export interface SpinOutcome {
  value: number; // 0-36
  color: Color;
}

export interface Wheel {
  spin(): SpinOutcome;
}

export type SessionState = 'awaiting_bet' | 'resolving' | 'terminated';
export type EndReason = 'cash_out' | 'broke' | 'interrupted';

export interface RoundRecord {
  round: number;
  bet: Bet;
  outcome: SpinOutcome;
  profit: number;
  balance: number; // after settlement
}

export interface SessionSummary {
  endReason: EndReason;
  stake: number;
  balance: number;
  net: number;
  rounds: number;
  wins: number;
  losses: number;
  biggestWin: number;
}
