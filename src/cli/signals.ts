const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type Interruptible = { interrupt(signal?: string): void };

export type SignalRelay = {
  readonly received: NodeJS.Signals | undefined;
  attach(target: Interruptible): void;
  dispose(): void;
};

/**
 * Routes SIGINT/SIGTERM to whatever is attached. A signal that lands before
 * anything is attached is replayed on attach.
 */
export function relaySignals(proc: NodeJS.EventEmitter = process): SignalRelay {
  let target: Interruptible | undefined;
  let received: NodeJS.Signals | undefined;

  const onSignal = (signal: NodeJS.Signals) => {
    received = signal;
    target?.interrupt(signal);
  };
  for (const s of SIGNALS) proc.on(s, onSignal);

  return {
    get received() {
      return received;
    },
    attach(next) {
      target = next;
      if (received) next.interrupt(received);
    },
    dispose() {
      for (const s of SIGNALS) proc.off(s, onSignal);
      target = undefined;
    },
  };
}
