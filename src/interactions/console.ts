import readline from 'node:readline';
import { ui } from '../cli/ui.js';
import { PromptClosedError, PromptInterruptedError, type Terminal, type Tone } from './terminal.js';

export interface ConsoleTerminal extends Terminal {
  /** Rejects the pending question, if any, and refuses further ones. */
  interrupt(signal?: string): void;
  close(): void;
}

type Waiter = { resolve: (line: string) => void; reject: (err: Error) => void };

export function createConsoleTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConsoleTerminal {
  const rl = readline.createInterface({ input, output, terminal: !!process.stdin.isTTY && input === process.stdin });
  // Lines can arrive before they are asked for (piped or pasted input)
  const buffered: string[] = [];
  let waiter: Waiter | undefined;
  let closed = false;
  let interrupted: Error | undefined;

  const rejectWaiter = (err: Error) => {
    const w = waiter;
    waiter = undefined;
    w?.reject(err);
  };

  rl.on('line', (line) => {
    const w = waiter;
    if (!w) {
      buffered.push(line);
      return;
    }
    waiter = undefined;
    w.resolve(line);
  });
  rl.on('close', () => {
    closed = true;
    rejectWaiter(new PromptClosedError());
  });
  // Without a listener readline only pauses on Ctrl+C
  rl.on('SIGINT', () => terminal.interrupt('SIGINT'));

  const terminal: ConsoleTerminal = {
    ask(question: string) {
      if (interrupted) return Promise.reject(interrupted);
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }
      const next = buffered.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (closed) return Promise.reject(new PromptClosedError());
      return new Promise<string>((resolve, reject) => {
        waiter = { resolve, reject };
      });
    },
    say(line: string, tone: Tone = 'info') {
      output.write(`${ui.style(line, tone)}\n`);
    },
    interrupt(signal = 'SIGINT') {
      if (interrupted) return;
      interrupted = new PromptInterruptedError(signal);
      rejectWaiter(interrupted);
    },
    close() {
      rl.close();
    },
  };
  return terminal;
}
