import dayjs from 'dayjs';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { getPalette } from './theme.js';
import { isCi, isTestEnv } from '../util/env.js';

export type UiOptions = {
  noColor?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export type Ui = ReturnType<typeof createUi>;

function isInteractive() {
  return !!process.stdout.isTTY && !isCi();
}

export function createUi(opts: UiOptions = {}) {
  const noColor = !!opts.noColor || !!process.env.NO_COLOR || !isInteractive();
  const palette = getPalette(noColor);
  const ts = () => palette.dim(dayjs().format('YYYY-MM-DD HH:mm:ss'));

  function say(msg: string, style: 'info' | 'success' | 'warn' | 'error' | 'dim' = 'info') {
    // Keep Jest runs clean
    if (isTestEnv()) return;
    if (opts.quiet && style !== 'error') return;
    let out = msg;
    switch (style) {
      case 'success': out = `${logSymbols.success} ${palette.success(msg)}`; break;
      case 'warn': out = `${logSymbols.warning} ${palette.warn(msg)}`; break;
      case 'error': out = `${logSymbols.error} ${palette.error(msg)}`; break;
      case 'dim': out = palette.dim(msg); break;
      default: out = `${logSymbols.info} ${palette.info(msg)}`; break;
    }
    if (opts.verbose) out = `${ts()} ${out}`;
    // status lines go to stderr so stdout carries only results
    console.error(out);
  }

  /** Print a computed value on stdout, undecorated when piped */
  function result(value: string) {
    if (isTestEnv()) return;
    console.log(noColor ? value : palette.value(value));
  }

  function elapsed(label: string, ms: number) {
    say(`${label} ${palette.dim('(' + prettyMs(ms) + ')')}`, 'dim');
  }

  function table(rows: Array<Record<string, string | number>>) {
    if (isTestEnv()) return;
    if (rows.length === 0) {
      console.log('(none)');
      return;
    }
    const headers = Object.keys(rows[0]);
    const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
    console.log(headers.map((h, i) => palette.info(h.padEnd(widths[i]))).join('  '));
    for (const r of rows) {
      console.log(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  '));
    }
  }

  return { say, result, elapsed, table };
}
