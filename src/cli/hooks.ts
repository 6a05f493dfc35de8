import fs from 'node:fs';
import chalk from 'chalk';
import type { Command } from 'commander';
import { isOutputFormat, type OutputFormat } from '../config.js';
import { ValidationError, getErrorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { OutputStream } from '../output/formatter.js';
import { buildFieldsQuery, compileQuery } from '../output/query.js';
import { MAX_TEXT_FILE_SIZE_BYTES, readTextFile } from '../utils/file-read.js';
import { warnDeprecatedUsage } from './deprecation.js';
import { findOption, isFlagChanged } from './flag-aliases.js';
import { normalizeCommandArgs, normalizeIdFlags } from './id-tokens.js';
import {
  OUTPUT_MODE_OPTION,
  OUTPUT_QUERY_OPTION,
  getRoot,
  getRootOptions,
} from './root-options.js';

export interface HookDeps {
  /** Reads `--query-file -`. */
  readStdin?: () => string;
  /** Receives deprecation warnings. */
  stderr?: OutputStream;
}

type PreActionStep = (actionCommand: Command, deps: HookDeps) => void;

function readStdinSync(): string {
  return fs.readFileSync(process.stdin.fd, 'utf-8');
}

/**
 * Set an option declared on `cmd` or an ancestor. `implied` marks values derived
 * from other flags; without a source the current one is kept.
 */
function setRootValue(cmd: Command, name: string, value: unknown, source?: 'implied'): void {
  const found = findOption(cmd, name);
  if (!found) return;
  const key = found.option.attributeName();
  const nextSource = source ?? found.command.getOptionValueSource(key) ?? 'implied';
  found.command.setOptionValueWithSource(key, value, nextSource);
}

export function normalizeIds(actionCommand: Command): void {
  normalizeCommandArgs(actionCommand);
  normalizeIdFlags(actionCommand);
}

/** --limit N sets --page-size N on commands that have one. */
export function applyLimitToPageSize(actionCommand: Command): void {
  if (!isFlagChanged(actionCommand, 'limit')) return;
  const { limit } = getRootOptions(actionCommand);
  if (limit === undefined) return;
  if (limit < 0) {
    throw new ValidationError('limit must be >= 0');
  }
  const pageSize = actionCommand.options.find((option) => option.long === '--page-size');
  if (!pageSize) return;
  actionCommand.setOptionValueWithSource(pageSize.attributeName(), limit, 'implied');
}

/** --force implies --yes; --results-only implies --items-only unless --items-only was given. */
export function applyNonInteractive(actionCommand: Command): void {
  const options = getRootOptions(actionCommand);
  if (options.force) {
    setRootValue(actionCommand, 'yes', true, 'implied');
  }
  if (options.resultsOnly && !isFlagChanged(actionCommand, 'items-only')) {
    setRootValue(actionCommand, 'items-only', true, 'implied');
  }
}

export function normalizeRequestedOutput(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new ValidationError(
      `unsupported output format "${value.trim()}" (use text, json, jsonl or ndjson)`,
    );
  }
  return normalized;
}

export function readQueryFile(target: string, readStdin: () => string = readStdinSync): string {
  const path = target.trim();
  if (!path) {
    throw new ValidationError('--query-file cannot be empty');
  }

  let raw: string;
  if (path === '-') {
    try {
      raw = readStdin();
    } catch (error) {
      throw new ValidationError(`failed to read --query-file from stdin: ${getErrorMessage(error)}`);
    }
    if (Buffer.byteLength(raw, 'utf-8') > MAX_TEXT_FILE_SIZE_BYTES) {
      throw new ValidationError(`--query-file too large (max ${MAX_TEXT_FILE_SIZE_BYTES} bytes)`);
    }
  } else {
    raw = readTextFile(path, { label: '--query-file' });
  }

  const query = raw.trim();
  if (!query) {
    throw new ValidationError('--query-file is empty');
  }
  return query;
}

/** True when the command declares its own --query (as opposed to the root one). */
function hasLocalQueryOption(cmd: Command): boolean {
  if (!cmd.parent) return false;
  return cmd.options.some((option) => option.long === '--query');
}

/**
 * Normalize --output, force JSON when a query-like flag is used and resolve the
 * effective query: --query-file, then --jq/--query, then --fields. The result
 * is stored in the hidden --output-query option.
 */
export function setupOutputQuery(actionCommand: Command, deps: HookDeps = {}): void {
  const options = getRootOptions(actionCommand);

  const requested = normalizeRequestedOutput(options.output);
  setRootValue(actionCommand, OUTPUT_MODE_OPTION, requested, 'implied');
  let output: string = requested === 'text' ? 'text' : 'json';
  if (output !== options.output) {
    setRootValue(actionCommand, 'output', output);
  }

  const query = options.query ?? '';
  const jq = options.jq ?? '';
  const queryFile = options.queryFile ?? '';
  const fields = options.fields ?? '';

  const needsJson = Boolean(options.json) || !!query || !!jq || !!queryFile || !!fields;
  if (needsJson && output !== 'json') {
    if (isFlagChanged(actionCommand, 'output')) {
      throw new ValidationError('--jq/--query/--query-file/--fields require --output json');
    }
    output = 'json';
    setRootValue(actionCommand, 'output', 'json', 'implied');
    setRootValue(actionCommand, OUTPUT_MODE_OPTION, 'json', 'implied');
  }

  if (query && jq) {
    throw new ValidationError('--jq and --query cannot be used together (use one)');
  }
  if (queryFile && (query || jq)) {
    throw new ValidationError('--query-file and --query/--jq cannot be used together (use one)');
  }

  let effective = jq || query;
  if (queryFile) {
    effective = readQueryFile(queryFile, deps.readStdin);
  }
  if (fields) {
    if (effective) {
      throw new ValidationError(
        '--fields and --query/--jq/--query-file cannot be used together (use one)',
      );
    }
    effective = buildFieldsQuery(fields);
  }
  if (effective) {
    compileQuery(effective);
  }

  setRootValue(actionCommand, OUTPUT_QUERY_OPTION, effective, 'implied');

  // Commands without their own --query read the root one.
  if (!hasLocalQueryOption(actionCommand) && effective && effective !== query) {
    setRootValue(getRoot(actionCommand), 'query', effective, 'implied');
  }
}

export function applyColorMode(actionCommand: Command): void {
  const { color } = getRootOptions(actionCommand);
  if (color === 'never') {
    chalk.level = 0;
  } else if (color === 'always' && chalk.level === 0) {
    chalk.level = 1;
  }
}

export const PRE_ACTION_STEPS: readonly PreActionStep[] = [
  (cmd, deps) => warnDeprecatedUsage(cmd, deps.stderr),
  (cmd) => normalizeIds(cmd),
  (cmd) => applyLimitToPageSize(cmd),
  (cmd) => applyNonInteractive(cmd),
  (cmd, deps) => setupOutputQuery(cmd, deps),
  (cmd) => applyColorMode(cmd),
];

/** Install the pre-action chain on the root; it runs for every leaf command. */
export function installPreActionHooks(root: Command, deps: HookDeps = {}): void {
  root.hook('preAction', (_thisCommand, actionCommand) => {
    logger.debug('preAction', { command: actionCommand.name(), args: actionCommand.args });
    for (const step of PRE_ACTION_STEPS) {
      step(actionCommand, deps);
    }
  });
}
