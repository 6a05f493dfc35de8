import { formatTable } from '../utils/display.js';
import { formatId, parseId } from '../cli/id-tokens.js';
import { compileQuery, runQuery } from './query.js';

export type OutputMode = 'text' | 'json' | 'jsonl' | 'ndjson';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface FormatterOptions {
  mode: OutputMode;
  /** Effective path query (from --query, --jq, --query-file or --fields). */
  query?: string;
  itemsOnly?: boolean;
  /** Prefix used to decorate the first table column as `[prefix:$id]`. */
  idPrefix?: string;
  out?: OutputStream;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrapItems(data: unknown): unknown {
  if (isRecord(data) && Array.isArray(data.items)) return data.items;
  return data;
}

/** Read a dotted path (`customer.email`) from a record. */
export function readPath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export class Formatter {
  readonly mode: OutputMode;
  private readonly query?: string;
  private readonly itemsOnly: boolean;
  private readonly idPrefix?: string;
  private readonly out: OutputStream;

  constructor(options: FormatterOptions) {
    this.mode = options.mode;
    this.query = options.query || undefined;
    this.itemsOnly = options.itemsOnly ?? false;
    this.idPrefix = options.idPrefix || undefined;
    this.out = options.out ?? process.stdout;
  }

  get isJson(): boolean {
    return this.mode !== 'text';
  }

  private writeLine(line: string): void {
    this.out.write(`${line}\n`);
  }

  table(headers: string[], rows: string[][]): void {
    const decorated = rows.map((row) => {
      const [first, ...rest] = row;
      if (this.idPrefix && first && !parseId(first)) {
        return [formatId(this.idPrefix, first), ...rest];
      }
      return row;
    });
    const records = decorated.map((row) => {
      const record: Record<string, string> = {};
      headers.forEach((header, i) => {
        record[header] = row[i] ?? '';
      });
      return record;
    });
    this.writeLine(formatTable(records, headers));
  }

  private writeJsonValues(values: unknown[]): void {
    if (this.mode === 'jsonl' || this.mode === 'ndjson') {
      for (const value of values) {
        for (const line of Array.isArray(value) ? value : [value]) {
          this.writeLine(JSON.stringify(line ?? null));
        }
      }
      return;
    }
    for (const value of values) {
      this.writeLine(JSON.stringify(value ?? null, null, 2));
    }
  }

  json(data: unknown): void {
    const payload = this.itemsOnly ? unwrapItems(data) : data;
    if (this.query) {
      this.writeJsonValues(runQuery(compileQuery(this.query), payload));
      return;
    }
    this.writeJsonValues([payload]);
  }

  /**
   * JSON modes print `data` as-is; text mode renders the items (or the single
   * record) as a table over `columns`.
   */
  output(data: unknown, columns: string[]): void {
    if (this.isJson) {
      this.json(data);
      return;
    }
    const unwrapped = unwrapItems(data);
    const records = Array.isArray(unwrapped) ? unwrapped : [unwrapped];
    const rows = records.map((record: unknown) =>
      columns.map((column) => formatCell(readPath(record, column))),
    );
    this.table(columns, rows);
  }

  success(message: string): void {
    this.writeLine(message);
  }
}
