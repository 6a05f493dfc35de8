/**
 * Path queries over JSON output.
 *
 * Supported forms, joined with `|`:
 *   .                 identity
 *   .key.sub          field access (missing keys and null yield null)
 *   .items[]          iterate array elements or object values
 *   .items[0] .[-1]   index (negative counts from the end)
 *   {id,name}         projection; over an array, or an object carrying an
 *                     `items` array, each element is projected
 *
 * A query yields a stream of values, as jq does.
 */

import { ValidationError } from '../lib/errors.js';

type Step =
  | { kind: 'field'; name: string }
  | { kind: 'iterate' }
  | { kind: 'index'; index: number }
  | { kind: 'project'; fields: string[] };

export interface CompiledQuery {
  source: string;
  stages: Step[][];
}

const IDENT = /^[A-Za-z_][A-Za-z0-9_-]*/;
const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function invalid(source: string, detail: string): ValidationError {
  return new ValidationError(`invalid query "${source}": ${detail}`);
}

function parseStage(source: string, stage: string): Step[] {
  const steps: Step[] = [];
  let rest = stage.trim();
  if (!rest) throw invalid(source, 'empty expression');

  if (rest.startsWith('{')) {
    if (!rest.endsWith('}')) throw invalid(source, 'unterminated projection');
    const fields = rest
      .slice(1, -1)
      .split(',')
      .map((field) => field.trim());
    if (fields.some((field) => !FIELD_NAME.test(field))) {
      throw invalid(source, 'projection fields must be plain names');
    }
    return [{ kind: 'project', fields }];
  }

  if (!rest.startsWith('.')) throw invalid(source, `expected "." at "${rest}"`);

  let first = true;
  while (rest.length > 0) {
    if (rest.startsWith('[')) {
      const close = rest.indexOf(']');
      if (close === -1) throw invalid(source, 'unterminated "["');
      const inner = rest.slice(1, close).trim();
      if (inner === '') {
        steps.push({ kind: 'iterate' });
      } else if (/^-?\d+$/.test(inner)) {
        steps.push({ kind: 'index', index: Number(inner) });
      } else {
        throw invalid(source, `unsupported index "${inner}"`);
      }
      rest = rest.slice(close + 1);
      first = false;
      continue;
    }
    if (!rest.startsWith('.')) throw invalid(source, `unexpected "${rest}"`);
    rest = rest.slice(1);
    const ident = IDENT.exec(rest);
    if (ident) {
      steps.push({ kind: 'field', name: ident[0] });
      rest = rest.slice(ident[0].length);
    } else if (!first && !rest.startsWith('[')) {
      throw invalid(source, 'expected a field name after "."');
    }
    first = false;
  }
  return steps;
}

export function compileQuery(source: string): CompiledQuery {
  const trimmed = source.trim();
  if (!trimmed) throw invalid(source, 'empty expression');
  return { source: trimmed, stages: trimmed.split('|').map((stage) => parseStage(trimmed, stage)) };
}

function project(value: unknown, fields: string[]): unknown {
  if (Array.isArray(value)) return value.map((item) => project(item, fields));
  if (!isRecord(value)) return value;
  const items = value.items;
  if (Array.isArray(items) && !fields.includes('items')) {
    return items.map((item: unknown) => project(item, fields));
  }
  const out: Record<string, unknown> = {};
  for (const field of fields) {
    out[field] = Object.hasOwn(value, field) ? value[field] : null;
  }
  return out;
}

function applyStep(source: string, step: Step, value: unknown): unknown[] {
  switch (step.kind) {
    case 'field':
      if (value === null) return [null];
      if (!isRecord(value)) {
        throw invalid(source, `cannot index ${typeName(value)} with "${step.name}"`);
      }
      return [Object.hasOwn(value, step.name) ? value[step.name] : null];
    case 'iterate':
      if (Array.isArray(value)) return value;
      if (isRecord(value)) return Object.values(value);
      throw invalid(source, `cannot iterate over ${typeName(value)}`);
    case 'index': {
      if (value === null) return [null];
      if (!Array.isArray(value)) {
        throw invalid(source, `cannot index ${typeName(value)} with a number`);
      }
      const at = step.index < 0 ? value.length + step.index : step.index;
      return [at >= 0 && at < value.length ? value[at] : null];
    }
    case 'project':
      return [project(value, step.fields)];
  }
}

export function runQuery(query: CompiledQuery | string, input: unknown): unknown[] {
  const compiled = typeof query === 'string' ? compileQuery(query) : query;
  let stream: unknown[] = [input];
  for (const stage of compiled.stages) {
    for (const step of stage) {
      stream = stream.flatMap((value) => applyStep(compiled.source, step, value));
    }
  }
  return stream;
}

/** `--fields id,name` -> `{id,name}`. */
export function buildFieldsQuery(fields: string): string {
  const names = fields
    .split(',')
    .map((field) => field.trim())
    .filter(Boolean);
  if (names.length === 0) {
    throw new ValidationError('--fields requires at least one field name');
  }
  return `{${names.join(',')}}`;
}
