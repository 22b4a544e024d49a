import boxen from 'boxen';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { colorDisabled, getPalette } from './theme.js';
import { isTestEnv } from '../util/env.js';

function isQuiet() {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

function isInteractive() {
  return process.stdout.isTTY && !process.env.CI && !isQuiet();
}

const palette = getPalette();
const c = new chalk.Instance({ level: colorDisabled() ? 0 : 3 });

function banner(title: string, subtitle: string) {
  if (!isInteractive() || isTestEnv()) return;
  console.log(boxen(`${c.bold(palette.info(title))}\n${c.dim(subtitle)}`, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

function say(msg: string, style: 'info' | 'success' | 'warn' | 'error' | 'dim' | 'plain' = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  let out = msg;
  switch (style) {
    case 'success': out = `${logSymbols.success} ${palette.success(msg)}`; break;
    case 'warn': out = `${logSymbols.warning} ${palette.warn(msg)}`; break;
    case 'error': out = `${logSymbols.error} ${palette.error(msg)}`; break;
    case 'dim': out = palette.dim(msg); break;
    case 'plain': break;
    default: out = `${logSymbols.info} ${palette.info(msg)}`; break;
  }
  if (style === 'error') console.error(out);
  else console.log(out);
}

function bar(total: number, label = 'Rounds') {
  const b = new cliProgress.SingleBar(
    {
      format: `${c.cyan(label)} {bar} {value}/{total}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      synchronousUpdate: true,
    },
    cliProgress.Presets.shades_classic,
  );
  const live = isInteractive() && !isTestEnv();
  if (live) b.start(total, 0);
  return {
    update: (v: number) => { if (live) b.update(v); },
    stop: () => { if (live) b.stop(); },
  };
}

function table(rows: Array<Record<string, string | number>>) {
  if (isTestEnv()) return;
  if (rows.length === 0) return console.log('(none)');
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  console.log(headers.map((h, i) => c.bold(h.padEnd(widths[i]))).join('  '));
  for (const r of rows) {
    console.log(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  '));
  }
}

function timed<T>(label: string, fn: () => T): T {
  const start = Date.now();
  const res = fn();
  say(`${label} ${c.gray('(' + prettyMs(Date.now() - start) + ')')}`, 'success');
  return res;
}

export const ui = { banner, say, bar, table, timed };
export default ui;
