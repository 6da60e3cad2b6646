import cliProgress from 'cli-progress';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import { getPalette } from './theme.js';
import type { Palette } from './theme.js';
import { isInteractive, isTestEnv } from '../util/env.js';

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';
export type Row = Record<string, string | number>;

function quiet() {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

export function formatLine(msg: string, style: Style, palette: Palette): string {
  switch (style) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return palette.bold(palette.info(msg));
    default: return `${logSymbols.info} ${palette.info(msg)}`;
  }
}

/** Status line on stderr, so stdout carries only records. */
function say(msg: string, style: Style = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (quiet() && style !== 'error') return;
  console.error(formatLine(msg, style, getPalette()));
}

function bar(total: number, label = 'Sessions') {
  const enabled = isInteractive() && !isTestEnv();
  const b = new cliProgress.SingleBar(
    {
      format: `${label} {bar} {value}/{total}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );
  if (enabled) b.start(total, 0);
  return {
    tick: (n = 1) => { if (enabled) b.increment(n); },
    stop: () => { if (enabled) b.stop(); },
  };
}

/**
 * Column-aligned text table. `styleCell` may colour a cell; padding is
 * computed on the plain text.
 */
export function renderTable(
  rows: readonly Row[],
  opts: { headerStyle?: (s: string) => string; styleCell?: (header: string, value: string) => string } = {},
): string[] {
  if (rows.length === 0) return ['(none)'];
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  const headerLine = headers
    .map((h, i) => (opts.headerStyle ? opts.headerStyle(h.padEnd(widths[i])) : h.padEnd(widths[i])))
    .join('  ')
    .trimEnd();
  const lines = [headerLine];
  for (const r of rows) {
    const cells = headers.map((h, i) => {
      const text = String(r[h] ?? '');
      const pad = ' '.repeat(widths[i] - text.length);
      return (opts.styleCell ? opts.styleCell(h, text) : text) + pad;
    });
    lines.push(cells.join('  ').trimEnd());
  }
  return lines;
}

function table(rows: readonly Row[], styleCell?: (header: string, value: string) => string) {
  const palette = getPalette();
  for (const line of renderTable(rows, { headerStyle: palette.bold, styleCell })) console.log(line);
}

function elapsed(ms: number): string {
  return prettyMs(ms);
}

export const ui = { say, bar, table, elapsed };
export default ui;
