import type { Command } from 'commander';

const FORMATTED_ID = /^\[([^:[\]$]+):\$([^[\]]+)\]$/;

export interface ParsedId {
  prefix: string;
  id: string;
}

/** Decorated form printed in list output: `[order:$ord_123]`. */
export function formatId(prefix: string, id: string): string {
  return `[${prefix}:$${id}]`;
}

export function parseId(token: string): ParsedId | null {
  const match = FORMATTED_ID.exec(token);
  if (!match) return null;
  return { prefix: match[1], id: match[2] };
}

/** Strip the `[prefix:$id]` decoration; anything else comes back unchanged with `matched: false`. */
export function normalizeIdToken(token: string): { id: string; matched: boolean } {
  const parsed = parseId(token);
  return parsed ? { id: parsed.id, matched: true } : { id: token, matched: false };
}

export function isIdFlag(name: string): boolean {
  return name === 'id' || name === 'ids' || name.endsWith('-id') || name.endsWith('-ids');
}

function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') return normalizeIdToken(value).id;
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (typeof item === 'string' ? normalizeIdToken(item).id : item));
  }
  return value;
}

export function normalizeIdArgs(args: string[]): string[] {
  return args.map((arg) => normalizeIdToken(arg).id);
}

/**
 * Rewrite decorated IDs in the parsed operands of `cmd`, in place. Covers both
 * `args` and `processedArgs` (where variadic operands are arrays).
 */
export function normalizeCommandArgs(cmd: Command): void {
  cmd.args = normalizeIdArgs(cmd.args);
  cmd.processedArgs = cmd.processedArgs.map(normalizeValue);
}

/** Rewrite decorated IDs in every ID-named option that the user set on `cmd`. */
export function normalizeIdFlags(cmd: Command): void {
  for (const option of cmd.options) {
    if (!option.long || !isIdFlag(option.long.slice(2))) continue;
    const key = option.attributeName();
    if (cmd.getOptionValueSource(key) !== 'cli') continue;

    const current: unknown = cmd.getOptionValue(key);
    const next = normalizeValue(current);
    const changed = Array.isArray(current) && Array.isArray(next)
      ? next.some((item, i) => item !== current[i])
      : next !== current;
    if (changed) {
      cmd.setOptionValueWithSource(key, next, 'cli');
    }
  }
}
