import { Help, type Command, type Option } from 'commander';
import { NotFoundError } from '../lib/errors.js';
import type { OutputStream } from '../output/formatter.js';
import { getCommandDeprecation, getOptionDeprecation } from './deprecation.js';
import { getAliasOf } from './flag-aliases.js';
import { parseInteger } from './root-options.js';

export interface HelpFlag {
  name: string;
  shorthand?: string;
  type: 'bool' | 'int' | 'string' | 'stringArray';
  default?: unknown;
  usage: string;
  required: boolean;
  deprecated: boolean;
  persistent: boolean;
  hidden: boolean;
  aliasOf?: string;
}

export interface HelpCommand {
  name: string;
  use: string;
  short: string;
  aliases: string[];
  /** Deprecation message, when the command is deprecated. */
  deprecated?: string;
  hidden: boolean;
  flags: HelpFlag[];
  subcommands: HelpCommand[];
}

const help = new Help();

function flagType(option: Option): HelpFlag['type'] {
  if (option.isBoolean() || option.negate) return 'bool';
  if (option.variadic) return 'stringArray';
  if (Object.is(option.parseArg, parseInteger)) return 'int';
  return 'string';
}

function buildFlag(option: Option, persistent: boolean): HelpFlag | undefined {
  if (!option.long) return undefined;
  const flag: HelpFlag = {
    name: option.long.slice(2),
    type: flagType(option),
    usage: option.description,
    required: option.mandatory,
    deprecated: getOptionDeprecation(option) !== undefined,
    persistent,
    hidden: option.hidden,
  };
  if (option.short) flag.shorthand = option.short.slice(1);
  if (option.defaultValue !== undefined) flag.default = option.defaultValue;
  const aliasOf = getAliasOf(option);
  if (aliasOf) flag.aliasOf = aliasOf;
  return flag;
}

function buildUse(cmd: Command): string {
  const args = cmd.registeredArguments.map((arg) => {
    const name = arg.variadic ? `${arg.name()}...` : arg.name();
    return arg.required ? `<${name}>` : `[${name}]`;
  });
  return [cmd.name(), ...args].join(' ');
}

/** Machine-readable description of `cmd` and everything below it. */
export function buildHelpCommand(cmd: Command): HelpCommand {
  const persistent = !cmd.parent;
  const deprecated = getCommandDeprecation(cmd);
  return {
    name: cmd.name(),
    use: buildUse(cmd),
    short: cmd.description(),
    aliases: [...cmd.aliases()],
    ...(deprecated ? { deprecated } : {}),
    hidden: cmd.parent ? !help.visibleCommands(cmd.parent).includes(cmd) : false,
    flags: cmd.options
      .map((option) => buildFlag(option, persistent))
      .filter((flag): flag is HelpFlag => flag !== undefined),
    subcommands: cmd.commands.map((sub) => buildHelpCommand(sub)),
  };
}

/** Follow a path of command names or aliases from `root`. */
export function findCommand(root: Command, path: string[]): Command {
  let current = root;
  for (const part of path) {
    const next = current.commands.find(
      (sub) => sub.name() === part || sub.aliases().includes(part),
    );
    if (!next) {
      throw new NotFoundError(`unknown command "${path.join(' ')}"`);
    }
    current = next;
  }
  return current;
}

export function registerHelpJsonCommand(program: Command, out?: OutputStream): void {
  program
    .command('help-json')
    .description('Print command and flag metadata as JSON')
    .argument('[command...]', 'Command path (names or aliases)')
    .action((path: string[]) => {
      const target = findCommand(program, path);
      const stream = out ?? process.stdout;
      stream.write(`${JSON.stringify(buildHelpCommand(target), null, 2)}\n`);
    });
}
