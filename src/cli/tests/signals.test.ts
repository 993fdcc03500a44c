import { EventEmitter } from 'node:events';
import { relaySignals } from '../signals.js';

function target() {
  const seen: Array<string | undefined> = [];
  return { seen, interrupt: (signal?: string) => { seen.push(signal); } };
}

describe('relaySignals', () => {
  test('forwards signals to the attached terminal', () => {
    const proc = new EventEmitter();
    const relay = relaySignals(proc);
    const t = target();
    relay.attach(t);
    proc.emit('SIGTERM', 'SIGTERM');
    expect(t.seen).toEqual(['SIGTERM']);
    relay.dispose();
  });

  test('replays a signal received before anything was attached', () => {
    const proc = new EventEmitter();
    const relay = relaySignals(proc);
    proc.emit('SIGINT', 'SIGINT');
    expect(relay.received).toBe('SIGINT');
    const t = target();
    relay.attach(t);
    expect(t.seen).toEqual(['SIGINT']);
    relay.dispose();
  });

  test('dispose removes the handlers', () => {
    const proc = new EventEmitter();
    const relay = relaySignals(proc);
    expect(proc.listenerCount('SIGINT')).toBe(1);
    expect(proc.listenerCount('SIGTERM')).toBe(1);
    relay.dispose();
    expect(proc.listenerCount('SIGINT')).toBe(0);
    expect(proc.listenerCount('SIGTERM')).toBe(0);
  });
});
