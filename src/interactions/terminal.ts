import { AppError } from '../util/errors.js';
import type { Parser } from '../games/roulette/input.js';

export type Tone = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

export interface Terminal {
  ask(question: string): Promise<string>;
  say(line: string, tone?: Tone): void;
}

export class PromptClosedError extends AppError {
  constructor() {
    super('ERR_PROMPT_CLOSED', 'Input stream closed');
  }
}

export class PromptInterruptedError extends AppError {
  constructor(signal = 'SIGINT') {
    super('ERR_PROMPT_INTERRUPTED', `Interrupted by ${signal}`);
  }
}

export function isPromptAbort(err: unknown): err is PromptClosedError | PromptInterruptedError {
  return err instanceof PromptClosedError || err instanceof PromptInterruptedError;
}

/** Asks until `parse` accepts the answer, echoing each rejection as a warning. */
export async function promptUntilValid<T>(terminal: Terminal, question: string, parse: Parser<T>): Promise<T> {
  for (;;) {
    const res = parse(await terminal.ask(question));
    if ('value' in res) return res.value;
    terminal.say(res.message, 'warn');
  }
}
