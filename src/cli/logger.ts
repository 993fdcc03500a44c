import path from 'node:path';
import pino, { type Logger } from 'pino';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

export type ScopedLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

let logger: Logger | undefined;

function open(): Logger {
  if (logger) return logger;
  const level = process.env.LOG_LEVEL || 'info';
  if (isTestEnv()) {
    logger = pino({ level: 'silent' });
    return logger;
  }
  const stream = pino.destination({ dest: path.resolve('logs', 'app.ndjson'), mkdir: true, sync: false });
  logger = pino({ level, base: undefined }, stream);
  return logger;
}

/** Overrides the level picked from LOG_LEVEL at first use. */
export function setLevel(level: string) {
  open().level = level;
}

export function flush() {
  logger?.flush();
}

function info(msg: string, scope?: string, data?: Data) {
  open().info({ msg, ts: Date.now(), scope, data });
}
function warn(msg: string, scope?: string, data?: Data) {
  open().warn({ msg, ts: Date.now(), scope, data });
}
function error(msg: string, scope?: string, data?: Data) {
  open().error({ msg, ts: Date.now(), scope, data });
}
function debug(msg: string, scope?: string, data?: Data) {
  open().debug({ msg, ts: Date.now(), scope, data });
}

function withScope(scope: string): ScopedLog {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

export const log = { info, warn, error, debug, withScope, setLevel, flush };
export default log;
