import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { getLogLevel, type Env } from '../config.js';
import { logger } from '../lib/logger.js';
import type { OutputStream } from '../output/formatter.js';
import { registerAuthCommands, type AuthCommandDeps } from './auth.js';
import { applyCommandAliases } from './command-aliases.js';
import { applyCommonFlagAliases, applyRootFlagAliases } from './flag-aliases.js';
import { registerHelpJsonCommand } from './help-json.js';
import { installPreActionHooks, type HookDeps } from './hooks.js';
import { registerResourceCommands, type Resource } from './resources.js';
import { addRootOptions, getRootOptions } from './root-options.js';
import type { RuntimeDeps } from './runtime.js';

export interface ProgramDeps {
  env?: Env;
  runtime?: RuntimeDeps;
  hooks?: HookDeps;
  auth?: AuthCommandDeps;
  out?: OutputStream;
  resources?: Resource[];
}

const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url));

function readVersion(): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    }
  } catch (error) {
    logger.debug('could not read package version', { error: String(error) });
  }
  return '0.0.0';
}

/**
 * Build the full `spl` command tree. Aliases are applied after every command
 * exists so sibling collisions can be detected.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const runtime: RuntimeDeps = { env, ...deps.runtime };
  const program = new Command();

  program
    .name('spl')
    .description('Command-line client for the Shopline admin API')
    .version(readVersion(), '-V, --version');
  addRootOptions(program, env);

  registerAuthCommands(program, { env, ...deps.auth });
  registerHelpJsonCommand(program, deps.out);
  registerResourceCommands(program, { runtime, out: deps.out }, deps.resources);

  applyCommandAliases(program);
  applyRootFlagAliases(program);
  applyCommonFlagAliases(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const level = getRootOptions(actionCommand).debug ? 'debug' : getLogLevel(env);
    logger.configure({ level });
  });
  installPreActionHooks(program, deps.hooks);

  return program;
}
