#!/usr/bin/env node
import dotenv from 'dotenv';
import prettyMs from 'pretty-ms';
import { ui } from './cli/ui.js';
import log from './cli/logger.js';
import { relaySignals, type SignalRelay } from './cli/signals.js';
import { ConfigError, resolveRuntime, type Runtime } from './config/runtime.js';
import { createConsoleTerminal } from './interactions/console.js';
import { RouletteSession, runSession } from './games/roulette/session.js';
import { createWheel } from './games/roulette/wheel.js';
import { rngFor } from './util/rng.js';
import { normalizeError, shortStack } from './util/errors.js';

dotenv.config({ override: false });

function loadRuntime(): Runtime | undefined {
  const s = ui.step('Loading config').start();
  try {
    const cfg = resolveRuntime();
    s.succeed('Config loaded');
    return cfg;
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    s.fail('Config load failed');
    for (const issue of e.issues) ui.say(issue, 'error');
    return undefined;
  }
}

async function main(): Promise<number> {
  const signals = relaySignals();
  try {
    return await play(signals);
  } finally {
    signals.dispose();
  }
}

async function play(signals: SignalRelay): Promise<number> {
  const cfg = loadRuntime();
  if (!cfg) return 1;
  if (!cfg.pretty) {
    process.env.CLI_BANNER = 'off';
    process.env.NO_COLOR = '1';
  }
  log.setLevel(cfg.logLevel);
  const sessionLog = log.withScope('session');

  ui.banner();

  const terminal = createConsoleTerminal();
  const session = new RouletteSession(cfg.stake);
  const wheel = createWheel(rngFor(cfg.seed));
  signals.attach(terminal);

  sessionLog.info('session_start', { session: session.id, stake: session.stake, seeded: cfg.seed !== undefined });
  const started = Date.now();
  try {
    const summary = await runSession(session, { terminal, wheel, log: sessionLog });
    const rounds = `${summary.rounds} ${summary.rounds === 1 ? 'round' : 'rounds'}`;
    ui.say(`Played ${rounds} in ${prettyMs(Date.now() - started, { secondsDecimalDigits: 0 })}.`, 'dim');
  } catch (e) {
    // Contract violations only; bad input never reaches here
    const info = normalizeError(e);
    sessionLog.error('session_failed', { session: session.id, error: info });
    ui.say(`The table closed unexpectedly (${info.code ?? info.name}): ${info.message}`, 'error');
    if (cfg.verbose) ui.say(shortStack(e, 6), 'dim');
  } finally {
    terminal.close();
    log.flush();
  }
  return 0;
}

main().then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    ui.say(`Fatal: ${normalizeError(e).message}`, 'error');
    process.exitCode = 1;
  },
);
