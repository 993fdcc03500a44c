import fs from 'node:fs';
import path from 'node:path';
import boxen from 'boxen';
import gradient from 'gradient-string';
import figlet from 'figlet';
import ora from 'ora';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isInteractive, isQuiet, isTestEnv } from '../util/env.js';
import type { Tone } from '../interactions/terminal.js';

let bannerPrinted = false;

function bannerDisabled() {
  return process.argv.includes('--banner=off') || process.env.CLI_BANNER === 'off' || process.env.CLI_BANNER === '0';
}

function banner(title = 'Roulette') {
  if (bannerPrinted || bannerDisabled() || isTestEnv() || !isInteractive()) return;
  bannerPrinted = true;
  const palette = getPalette();
  const text = figlet.textSync(title, { font: 'Standard' });
  const body = `${gradient(palette.gradient).multiline(text)}\n\n${palette.dim('v' + safeReadPkgVersion())}  ${palette.dim('European single zero')}`;
  console.log(boxen(body, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

function safeReadPkgVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve('package.json'), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  } catch {
    // no package.json beside the working directory
  }
  return '0.0.0';
}

function style(msg: string, tone: Tone): string {
  const palette = getPalette();
  switch (tone) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return palette.title(msg);
    default: return msg;
  }
}

/** Status output; silent under Jest and with --quiet (dim lines excepted). */
function say(msg: string, tone: Tone = 'info') {
  if (isTestEnv()) return;
  if (isQuiet() && tone !== 'dim') return;
  console.log(style(msg, tone));
}

function step(title: string) {
  return ora({ text: title, isEnabled: isInteractive() && !isTestEnv() });
}

export const ui = { banner, say, step, style };
export default ui;
