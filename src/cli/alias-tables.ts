import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { readJsonFile } from '../utils/file-read.js';
import { ConfigurationError } from '../lib/errors.js';

const AliasListTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)));
const AliasTableSchema = z.record(z.string().min(1), z.string().min(1));

const CommandAliasFileSchema = z.object({
  verbs: AliasListTableSchema,
  resources: AliasListTableSchema,
});

const FlagAliasFileSchema = z.object({
  root: AliasTableSchema,
  common: AliasTableSchema,
});

export type AliasListTable = z.infer<typeof AliasListTableSchema>;
export type AliasTable = z.infer<typeof AliasTableSchema>;

export interface CommandAliasTables {
  /** Command name -> aliases; applied at every depth. */
  verbs: AliasListTable;
  /** Top-level command name -> aliases; applied to direct children of the root only. */
  resources: AliasListTable;
}

export interface FlagAliasTables {
  /** Root option name -> alias. */
  root: AliasTable;
  /** Option name -> alias, applied on every command that declares the option. */
  common: AliasTable;
}

const COMMAND_ALIASES_FILE = fileURLToPath(
  new URL('../../data/command-aliases.json', import.meta.url),
);
const FLAG_ALIASES_FILE = fileURLToPath(new URL('../../data/flag-aliases.json', import.meta.url));

function loadTable<T>(filePath: string, schema: z.ZodType<T>, label: string): T {
  const parsed = schema.safeParse(readJsonFile(filePath, { label, expectObject: true }));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${label} (${filePath}): ${issues}`);
  }
  return parsed.data;
}

export function loadCommandAliasTables(filePath: string = COMMAND_ALIASES_FILE): CommandAliasTables {
  return loadTable(filePath, CommandAliasFileSchema, 'command alias table');
}

export function loadFlagAliasTables(filePath: string = FLAG_ALIASES_FILE): FlagAliasTables {
  return loadTable(filePath, FlagAliasFileSchema, 'flag alias table');
}

let commandTables: CommandAliasTables | undefined;
let flagTables: FlagAliasTables | undefined;

export function getCommandAliasTables(): CommandAliasTables {
  if (!commandTables) {
    commandTables = loadCommandAliasTables();
    logger.debug('Loaded command alias tables', {
      verbs: Object.keys(commandTables.verbs).length,
      resources: Object.keys(commandTables.resources).length,
    });
  }
  return commandTables;
}

export function getFlagAliasTables(): FlagAliasTables {
  if (!flagTables) {
    flagTables = loadFlagAliasTables();
    logger.debug('Loaded flag alias tables', {
      root: Object.keys(flagTables.root).length,
      common: Object.keys(flagTables.common).length,
    });
  }
  return flagTables;
}

/** Own-property lookup, so names like "constructor" never hit Object.prototype. */
export function lookupAlias<T>(table: Record<string, T>, name: string): T | undefined {
  return Object.hasOwn(table, name) ? table[name] : undefined;
}
