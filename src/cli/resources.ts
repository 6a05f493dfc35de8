import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import { z } from 'zod';
import type { ApiClient } from '../api/client.js';
import type { QueryParams } from '../api/http.js';
import { ConfigurationError, ValidationError } from '../lib/errors.js';
import { Formatter, type OutputMode, type OutputStream } from '../output/formatter.js';
import { readJsonFile } from '../utils/file-read.js';
import { formatWarning } from '../utils/display.js';
import { getClient, type RuntimeDeps } from './runtime.js';
import { getRootOptions, parseInteger } from './root-options.js';
import { isOutputFormat } from '../config.js';

const FLAG_NAME = /^[a-z][a-z0-9-]*$/;

export const ResourceSchema = z.object({
  name: z.string().regex(FLAG_NAME),
  path: z.string().startsWith('/'),
  idPrefix: z.string().min(1),
  description: z.string(),
  columns: z.array(z.string().min(1)).min(1),
  listFlags: z.array(z.string().regex(FLAG_NAME)),
  deletable: z.boolean(),
});

const ResourceFileSchema = z.object({
  resources: z.array(ResourceSchema),
});

export type Resource = z.infer<typeof ResourceSchema>;

const RESOURCES_FILE = fileURLToPath(new URL('../../data/resources.json', import.meta.url));

let registry: Resource[] | undefined;

export function loadResources(filePath: string = RESOURCES_FILE): Resource[] {
  const parsed = ResourceFileSchema.safeParse(
    readJsonFile(filePath, { label: 'resource registry', expectObject: true }),
  );
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid resource registry (${filePath}): ${issues}`);
  }
  return parsed.data.resources;
}

export function getResources(): Resource[] {
  registry ??= loadResources();
  return registry;
}

export function getResource(name: string): Resource | undefined {
  return getResources().find((resource) => resource.name === name);
}

export interface ResourceCommandDeps {
  runtime?: RuntimeDeps;
  out?: OutputStream;
}

type ListOptions = Record<string, string | number | undefined> & {
  page?: number;
  pageSize?: number;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DateFlagSchema = z.union([
  z.string().regex(DATE_ONLY),
  z.string().datetime({ offset: true }),
]);
const DATE_FLAGS = new Set(['from', 'to']);

function toParamName(flag: string): string {
  return flag.replace(/-/g, '_');
}

function toAttributeName(flag: string): string {
  return flag.replace(/-([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

export function createFormatter(cmd: Command, out?: OutputStream, idPrefix?: string): Formatter {
  const options = getRootOptions(cmd);
  const mode: OutputMode = isOutputFormat(options.outputMode) ? options.outputMode : 'text';
  return new Formatter({
    mode,
    query: options.outputQuery,
    itemsOnly: options.itemsOnly,
    idPrefix,
    out,
  });
}

/** Query parameters for a list call: pagination, declared filters, then --sort-by/--desc. */
export function buildListQuery(resource: Resource, cmd: Command, options: ListOptions): QueryParams {
  const query: QueryParams = {
    page: options.page,
    page_size: options.pageSize,
  };
  for (const flag of resource.listFlags) {
    const value = options[toAttributeName(flag)];
    if (value === undefined) continue;
    if (DATE_FLAGS.has(flag) && !DateFlagSchema.safeParse(value).success) {
      throw new ValidationError(`invalid --${flag} date "${value}", use RFC3339 or YYYY-MM-DD`);
    }
    query[toParamName(flag)] = value;
  }

  const root = getRootOptions(cmd);
  if (root.sortBy) {
    query.sort_by = root.sortBy;
    query.sort_order = root.desc ? 'desc' : 'asc';
  }
  return query;
}

async function withSpinner<T>(text: string, formatter: Formatter, run: () => Promise<T>): Promise<T> {
  const interactive = !formatter.isJson && process.stderr.isTTY === true;
  const spinner = ora({ text, isEnabled: interactive, isSilent: !interactive });
  spinner.start();
  try {
    const result = await run();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}

async function confirmDelete(resource: Resource, id: string, cmd: Command): Promise<boolean> {
  const options = getRootOptions(cmd);
  if (options.yes) return true;
  if (!options.input) {
    throw new ValidationError(
      `refusing to delete ${resource.idPrefix} ${id} without confirmation; pass --yes`,
    );
  }
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: `Delete ${resource.idPrefix} ${id}?`,
      default: false,
    },
  ]);
  return confirmed;
}

function registerResource(program: Command, resource: Resource, deps: ResourceCommandDeps): void {
  const clientFor = (cmd: Command): ApiClient => getClient(cmd, deps.runtime);
  const group = program.command(resource.name).description(resource.description);

  const list = group
    .command('list')
    .description(`List ${resource.name}`)
    .option('--page <n>', 'Page number', parseInteger)
    .option('--page-size <n>', 'Results per page', parseInteger);
  for (const flag of resource.listFlags) {
    list.option(`--${flag} <value>`, `Filter by ${flag.replace(/-/g, ' ')}`);
  }
  list.action(async (options: ListOptions, cmd: Command) => {
    const formatter = createFormatter(cmd, deps.out, resource.idPrefix);
    const query = buildListQuery(resource, cmd, options);
    const client = clientFor(cmd);
    const data = await withSpinner(`Fetching ${resource.name}...`, formatter, () =>
      client.list(resource.path, query),
    );
    formatter.output(data, resource.columns);
  });

  group
    .command('get')
    .description(`Show one ${resource.idPrefix.replace(/_/g, ' ')}`)
    .argument('<id>', `${resource.idPrefix} ID`)
    .action(async (id: string, _options: Record<string, never>, cmd: Command) => {
      const formatter = createFormatter(cmd, deps.out);
      const client = clientFor(cmd);
      const data = await withSpinner(`Fetching ${resource.idPrefix} ${id}...`, formatter, () =>
        client.get(resource.path, id),
      );
      formatter.output(data, resource.columns);
    });

  if (!resource.deletable) return;

  group
    .command('delete')
    .description(`Delete one ${resource.idPrefix.replace(/_/g, ' ')}`)
    .argument('<id>', `${resource.idPrefix} ID`)
    .action(async (id: string, _options: Record<string, never>, cmd: Command) => {
      const formatter = createFormatter(cmd, deps.out);
      if (getRootOptions(cmd).dryRun) {
        formatter.success(
          `[dry-run] would delete ${resource.idPrefix} ${id} (DELETE ${resource.path}/${id})`,
        );
        return;
      }
      if (!(await confirmDelete(resource, id, cmd))) {
        process.stderr.write(`${formatWarning('Cancelled.')}\n`);
        return;
      }
      const client = clientFor(cmd);
      await withSpinner(`Deleting ${resource.idPrefix} ${id}...`, formatter, () =>
        client.delete(resource.path, id),
      );
      if (formatter.isJson) {
        formatter.json({ id, deleted: true });
      } else {
        formatter.success(`Deleted ${resource.idPrefix} ${id}`);
      }
    });
}

export function registerResourceCommands(
  program: Command,
  deps: ResourceCommandDeps = {},
  resources: Resource[] = getResources(),
): void {
  for (const resource of resources) {
    registerResource(program, resource, deps);
  }
}
