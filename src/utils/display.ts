import chalk from 'chalk';

export function formatError(error: string): string {
  return chalk.red(`Error: ${error}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`! ${message}`);
}

/**
 * Plain column-aligned table. Headers are upper-cased; a missing cell renders empty.
 */
export function formatTable(rows: Record<string, string>[], columns?: string[]): string {
  if (rows.length === 0) return chalk.gray('(no results)');

  const cols = columns || Object.keys(rows[0]);
  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const val = row[col] ?? '';
      widths[col] = Math.max(widths[col], val.length);
    }
  }

  const pad = (value: string, col: string, last: boolean) =>
    last ? value : value.padEnd(widths[col]);
  const render = (cell: (col: string) => string) =>
    cols.map((c, i) => pad(cell(c), c, i === cols.length - 1)).join('  ');

  const header = render((c) => c.toUpperCase());
  const body = rows.map((row) => render((c) => row[c] ?? ''));
  return [chalk.bold(header), ...body].join('\n');
}

export function formatRelativeTime(isoOrMs: string | number, now: number = Date.now()): string {
  const ts = typeof isoOrMs === 'number' ? isoOrMs : new Date(isoOrMs).getTime();
  if (Number.isNaN(ts)) return 'unknown';
  const diff = now - ts;
  if (diff < 0) return 'just now';
  if (diff < 60_000) return `${Math.floor(diff / 1000)}s ago`;
  if (diff < 3_600_000) return `${Math.floor(diff / 60_000)}m ago`;
  if (diff < 86_400_000) return `${Math.floor(diff / 3_600_000)}h ago`;
  return `${Math.floor(diff / 86_400_000)}d ago`;
}

export function printAuthHelp(): void {
  console.error(chalk.gray('  Run `spl auth login` to add a store profile, or set SHOPLINE_ACCESS_TOKEN.'));
}
