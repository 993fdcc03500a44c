import { PassThrough } from 'node:stream';
import { parsePocket } from '../../games/roulette/input.js';
import { RouletteSession, runSession } from '../../games/roulette/session.js';
import { outcomeOf } from '../../games/roulette/wheel.js';
import { createConsoleTerminal } from '../console.js';
import { PromptClosedError, PromptInterruptedError, isPromptAbort, promptUntilValid, type Terminal } from '../terminal.js';

function fromAnswers(answers: string[]) {
  const lines: string[] = [];
  const questions: string[] = [];
  const terminal: Terminal = {
    ask: async (q) => {
      questions.push(q);
      const a = answers.shift();
      if (a === undefined) throw new PromptClosedError();
      return a;
    },
    say: (line) => { lines.push(line); },
  };
  return { terminal, lines, questions };
}

describe('promptUntilValid', () => {
  test('returns the first accepted answer', async () => {
    const { terminal, lines, questions } = fromAnswers(['12']);
    await expect(promptUntilValid(terminal, 'n? ', parsePocket)).resolves.toBe(12);
    expect(lines).toEqual([]);
    expect(questions).toEqual(['n? ']);
  });

  test('reports each rejection and asks again', async () => {
    const { terminal, lines, questions } = fromAnswers(['a', '40', '3']);
    await expect(promptUntilValid(terminal, 'n? ', parsePocket)).resolves.toBe(3);
    expect(lines).toEqual(['Please enter an integer.', 'Number must be between 0 and 36.']);
    expect(questions).toHaveLength(3);
  });

  test('propagates a closed prompt', async () => {
    const { terminal } = fromAnswers(['nope']);
    await expect(promptUntilValid(terminal, 'n? ', parsePocket)).rejects.toBeInstanceOf(PromptClosedError);
  });

  test('isPromptAbort matches only prompt errors', () => {
    expect(isPromptAbort(new PromptClosedError())).toBe(true);
    expect(isPromptAbort(new PromptInterruptedError())).toBe(true);
    expect(isPromptAbort(new Error('x'))).toBe(false);
    expect(new PromptInterruptedError('SIGTERM').message).toBe('Interrupted by SIGTERM');
  });
});

describe('console terminal', () => {
  function streams() {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', (chunk: Buffer) => { written += chunk.toString(); });
    return { input, output, written: () => written };
  }

  test('reads a line per question', async () => {
    const { input, output, written } = streams();
    const t = createConsoleTerminal(input, output);
    const answer = t.ask('Bet? ');
    input.write('25\n');
    await expect(answer).resolves.toBe('25');
    t.say('Current balance: $10.00');
    t.close();
    expect(written()).toContain('Bet? ');
    expect(written()).toContain('Current balance: $10.00\n');
  });

  test('closing the input rejects the pending question', async () => {
    const { input, output } = streams();
    const t = createConsoleTerminal(input, output);
    const answer = t.ask('Bet? ');
    input.end();
    await expect(answer).rejects.toBeInstanceOf(PromptClosedError);
    await expect(t.ask('again? ')).rejects.toBeInstanceOf(PromptClosedError);
  });

  test('interrupt rejects the pending question', async () => {
    const { input, output } = streams();
    const t = createConsoleTerminal(input, output);
    const answer = t.ask('Bet? ');
    t.interrupt('SIGTERM');
    await expect(answer).rejects.toThrow('Interrupted by SIGTERM');
    await expect(t.ask('again? ')).rejects.toBeInstanceOf(PromptInterruptedError);
    t.close();
  });

  test('answers lines that arrive together in order', async () => {
    const { input, output } = streams();
    const t = createConsoleTerminal(input, output);
    const a = t.ask('1? ');
    input.end('first\nsecond\n');
    await expect(a).resolves.toBe('first');
    await expect(t.ask('2? ')).resolves.toBe('second');
    await expect(t.ask('3? ')).rejects.toBeInstanceOf(PromptClosedError);
  });

  test('plays a full round from input sent in one chunk', async () => {
    const { input, output, written } = streams();
    const t = createConsoleTerminal(input, output);
    const session = new RouletteSession(100);
    const done = runSession(session, { terminal: t, wheel: { spin: () => outcomeOf(2) } });
    input.end('10\ncolor\nblack\n0\n');
    const summary = await done;
    t.close();
    await new Promise((resolve) => setImmediate(resolve));
    expect(summary).toMatchObject({ endReason: 'cash_out', stake: 100, balance: 110, net: 10, rounds: 1, wins: 1 });
    expect(written()).toContain('You won $10.00!');
  });
});
