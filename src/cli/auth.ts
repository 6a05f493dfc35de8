import type { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { z } from 'zod';
import {
  formatRelativeTime,
  formatSuccess,
  formatTable,
  formatWarning,
  printAuthHelp,
} from '../utils/display.js';
import { NotFoundError, ValidationError, getErrorMessage } from '../lib/errors.js';
import { redactSecret } from '../lib/secrets.js';
import {
  isCredentialOld,
  openCredentialStore,
  type StoreCredentials,
  type WritableCredentialStore,
} from '../profiles/store.js';
import { PLATFORM_HOST_SUFFIXES, resolveStoreCredentials } from '../profiles/resolve.js';
import { getRequestedStore } from './runtime.js';
import { getRootOptions } from './root-options.js';
import type { Env } from '../config.js';

export interface AuthCommandDeps {
  storeFactory?: () => WritableCredentialStore;
  env?: Env;
  now?: () => Date;
}

interface LoginOptions {
  name?: string;
  handle?: string;
  token?: string;
  appKey?: string;
  appSecret?: string;
  region?: string;
}

const HANDLE_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/** `demo-shop`, `demo-shop.myshopline.com` and `https://demo-shop.myshopline.com/admin` all give `demo-shop`. */
export function normalizeHandle(raw: string): string {
  let host = raw.trim().toLowerCase().replace(/^https?:\/\//, '');
  host = host.split('/')[0];
  for (const suffix of PLATFORM_HOST_SUFFIXES) {
    if (host.endsWith(suffix)) return host.slice(0, -suffix.length);
  }
  return host;
}

const LoginSchema = z.object({
  name: z.string().trim().min(1, 'Profile name is required'),
  handle: z
    .string()
    .transform(normalizeHandle)
    .pipe(z.string().regex(HANDLE_PATTERN, 'Store handle must be letters, digits and dashes')),
  token: z.string().trim().min(1, 'Access token is required'),
  appKey: z.string().trim().optional(),
  appSecret: z.string().trim().optional(),
  region: z.string().trim().optional(),
});

async function promptMissing(options: LoginOptions): Promise<LoginOptions> {
  const answers = await inquirer.prompt<{ handle?: string; name?: string; token?: string }>([
    {
      type: 'input',
      name: 'handle',
      message: 'Store handle or admin URL:',
      when: () => !options.handle,
      filter: (v: string) => v.trim(),
      validate: (v: string) => v.trim().length >= 1 || 'Store handle is required',
    },
    {
      type: 'input',
      name: 'name',
      message: 'Profile name:',
      when: () => !options.name,
      default: (current: { handle?: string }) =>
        normalizeHandle(options.handle ?? current.handle ?? ''),
      filter: (v: string) => v.trim(),
      validate: (v: string) => v.trim().length >= 1 || 'Profile name is required',
    },
    {
      type: 'password',
      name: 'token',
      message: 'Access token:',
      when: () => !options.token,
      filter: (v: string) => v.trim(),
      validate: (v: string) => v.trim().length >= 1 || 'Access token is required',
    },
  ]);
  return { ...options, ...answers };
}

function toTableRow(credentials: StoreCredentials, now: Date): Record<string, string> {
  return {
    name: credentials.name,
    handle: credentials.handle,
    region: credentials.region ?? '',
    token: redactSecret(credentials.accessToken),
    created: formatRelativeTime(credentials.createdAt, now.getTime()),
  };
}

export function registerAuthCommands(program: Command, deps: AuthCommandDeps = {}): void {
  const openStore = deps.storeFactory ?? (() => openCredentialStore());
  const now = deps.now ?? (() => new Date());
  const auth = program.command('auth').description('Manage store profiles and credentials');

  auth
    .command('login')
    .description('Store credentials for a Shopline store')
    .option('--name <name>', 'Profile name (defaults to the store handle)')
    .option('--handle <handle>', 'Store handle, domain or admin URL')
    .option('--token <token>', 'Admin API access token')
    .option('--app-key <key>', 'App key')
    .option('--app-secret <secret>', 'App secret')
    .option('--region <region>', 'Data region')
    .action(async (options: LoginOptions, cmd: Command) => {
      let input = options;
      if (!input.name && input.handle) {
        input = { ...input, name: normalizeHandle(input.handle) };
      }
      const interactive = getRootOptions(cmd).input;
      if (!input.handle || !input.name || !input.token) {
        if (!interactive) {
          throw new ValidationError('--handle and --token are required with --no-input');
        }
        input = await promptMissing(input);
      }

      const parsed = LoginSchema.safeParse(input);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
      }

      const store = openStore();
      const { name, handle, token, appKey, appSecret, region } = parsed.data;
      if (store.list().includes(name)) {
        console.error(formatWarning(`Replacing existing profile "${name}"`));
      }
      store.save({
        name,
        handle,
        accessToken: token,
        ...(appKey ? { appKey } : {}),
        ...(appSecret ? { appSecret } : {}),
        ...(region ? { region } : {}),
        createdAt: now().toISOString(),
      });
      console.log(formatSuccess(`Saved profile "${name}" for store ${handle}`));
    });

  auth
    .command('list')
    .description('List stored profiles')
    .action((_options: Record<string, never>, cmd: Command) => {
      const store = openStore();
      const profiles: StoreCredentials[] = [];
      for (const name of store.list()) {
        try {
          profiles.push(store.get(name));
        } catch (error) {
          console.error(
            formatWarning(`Skipping unreadable profile "${name}": ${getErrorMessage(error)}`),
          );
        }
      }
      const root = getRootOptions(cmd);

      if (root.output === 'json') {
        const summary = profiles.map(({ name, handle, region, createdAt }) => ({
          name,
          handle,
          region: region ?? null,
          createdAt,
        }));
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      if (profiles.length === 0) {
        console.log(chalk.gray('No store profiles configured.'));
        printAuthHelp();
        return;
      }
      const current = now();
      console.log(
        formatTable(
          profiles.map((profile) => toTableRow(profile, current)),
          ['name', 'handle', 'region', 'token', 'created'],
        ),
      );
      for (const profile of profiles) {
        if (isCredentialOld(profile, current.getTime())) {
          console.error(
            formatWarning(
              `Profile "${profile.name}" is over 90 days old; consider rotating its token`,
            ),
          );
        }
      }
    });

  auth
    .command('logout')
    .description('Remove a stored profile')
    .argument('<name>', 'Profile name')
    .action((name: string) => {
      const store = openStore();
      if (!store.delete(name)) {
        throw new NotFoundError(`no credentials stored for "${name}"`);
      }
      console.log(formatSuccess(`Removed profile "${name}"`));
    });

  auth
    .command('status')
    .description('Show which profile the current settings select')
    .action((_options: Record<string, never>, cmd: Command) => {
      const requested = getRequestedStore(cmd, deps.env);
      const store = openStore();
      const names = store.list();
      if (!requested && names.length !== 1) {
        console.log(
          chalk.gray(
            names.length === 0
              ? 'No store profiles configured.'
              : `${names.length} profiles configured; pass --store or set SHOPLINE_STORE to pick one.`,
          ),
        );
        return;
      }
      const credentials = resolveStoreCredentials(store, requested || names[0]);
      console.log(chalk.bold('Current profile'));
      console.log(chalk.gray(`  Name:    ${credentials.name}`));
      console.log(chalk.gray(`  Handle:  ${credentials.handle}`));
      console.log(chalk.gray(`  Token:   ${redactSecret(credentials.accessToken)}`));
      if (credentials.region) {
        console.log(chalk.gray(`  Region:  ${credentials.region}`));
      }
    });
}
