import { InvalidArgumentError, Option, type Command } from 'commander';
import { getDefaultOutput, type Env } from '../config.js';

export const OUTPUT_MODE_OPTION = 'output-mode';
export const OUTPUT_QUERY_OPTION = 'output-query';

export type RootOptions = {
  store?: string;
  output: string;
  outputMode: string;
  json?: boolean;
  color: string;
  query?: string;
  outputQuery?: string;
  jq?: string;
  queryFile?: string;
  fields?: string;
  itemsOnly?: boolean;
  resultsOnly?: boolean;
  yes?: boolean;
  force?: boolean;
  /** False when --no-input was given. */
  input: boolean;
  limit?: number;
  sortBy?: string;
  desc?: boolean;
  dryRun?: boolean;
  debug?: boolean;
};

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(trimmed, 10);
}

export function getRoot(cmd: Command): Command {
  let current = cmd;
  while (current.parent) current = current.parent;
  return current;
}

export function getRootOptions(cmd: Command): RootOptions {
  return getRoot(cmd).opts<RootOptions>();
}

/** Options recognised anywhere on the command line, before or after the subcommand. */
export function addRootOptions(program: Command, env: Env = process.env): Command {
  return program
    .option('-s, --store <name>', 'Store profile name, handle or admin URL (or set SHOPLINE_STORE)')
    .addOption(
      new Option('-o, --output <format>', 'Output format: text|json|jsonl|ndjson (env SHOPLINE_OUTPUT)')
        .default(getDefaultOutput(env)),
    )
    .addOption(new Option(`--${OUTPUT_MODE_OPTION} <mode>`).default('text').hideHelp())
    .option('--json', 'Shorthand for --output json')
    .addOption(
      new Option('--color <mode>', 'Color mode')
        .choices(['auto', 'always', 'never'])
        .default('auto'),
    )
    .option('-q, --query <expr>', 'Path query to filter JSON output (e.g. .items[].id)')
    .addOption(new Option(`--${OUTPUT_QUERY_OPTION} <expr>`).hideHelp())
    .option('--jq <expr>', 'Alias for --query')
    .option('--query-file <path>', "Read the query from a file ('-' for stdin)")
    .option('-F, --fields <list>', 'Select fields in JSON output (comma-separated)')
    .option('--items-only', 'Output only the items array when present (JSON output)')
    .option('--results-only', 'Alias for --items-only')
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('--force', 'Alias for --yes')
    .option('--no-input', 'Disable interactive prompts')
    .option('-l, --limit <n>', 'Limit number of results (sets page size for list commands)', parseInteger)
    .option('--sort-by <field>', 'Sort results by field')
    .option('-D, --desc', 'Sort in descending order')
    .option('--dry-run', 'Preview changes without executing them')
    .option('--debug', 'Verbose logging to stderr');
}
