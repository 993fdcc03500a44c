import { PromptClosedError, type Terminal, type Tone } from '../../src/interactions/terminal.js';
import { outcomeOf } from '../../src/games/roulette/wheel.js';
import type { Wheel } from '../../src/games/roulette/types.js';

export type Transcript = Array<{ kind: 'ask' | 'say'; text: string; tone?: Tone }>;

/** Answers questions from a fixed script; closes the input once it runs out. */
export function scriptedTerminal(answers: string[]) {
  const queue = [...answers];
  const transcript: Transcript = [];
  const terminal: Terminal = {
    async ask(question: string) {
      transcript.push({ kind: 'ask', text: question });
      const next = queue.shift();
      if (next === undefined) throw new PromptClosedError();
      return next;
    },
    say(line: string, tone: Tone = 'info') {
      transcript.push({ kind: 'say', text: line, tone });
    },
  };
  return {
    terminal,
    transcript,
    remaining: () => queue.length,
    said: () => transcript.filter((t) => t.kind === 'say').map((t) => t.text),
    asked: () => transcript.filter((t) => t.kind === 'ask').map((t) => t.text),
  };
}

/** Lands on the given pockets in order, then throws. */
export function fixedWheel(values: number[]): Wheel & { spins: () => number } {
  const queue = [...values];
  let spins = 0;
  return {
    spin() {
      const v = queue.shift();
      if (v === undefined) throw new Error('fixedWheel exhausted');
      spins++;
      return outcomeOf(v);
    },
    spins: () => spins,
  };
}
