import { Option, type Command } from 'commander';
import { getFlagAliasTables, lookupAlias, type AliasTable } from './alias-tables.js';

/**
 * Hidden long-flag alias bound to another option's value cell.
 *
 * Commander stores option values by attribute name. Reporting the original's
 * attribute name means `--ps 50` and `--page-size 50` write the same cell, and
 * the value source recorded for it is the original's "changed" state.
 */
export class AliasOption extends Option {
  readonly aliasOf: string;
  private readonly target: Option;

  constructor(alias: string, original: Option) {
    const valueShape = original.required ? ' <value>' : original.optional ? ' [value]' : '';
    const variadic = original.variadic && valueShape ? valueShape.replace(/([>\]])$/, '...$1') : valueShape;
    super(`--${alias}${variadic}`, '');
    this.aliasOf = original.name();
    this.target = original;
    this.parseArg = original.parseArg;
    this.argChoices = original.argChoices;
    this.presetArg = original.presetArg;
    this.hideHelp();
  }

  override attributeName(): string {
    return this.target.attributeName();
  }
}

export interface OptionLocation {
  command: Command;
  option: Option;
}

/** Find a long option by name on `cmd` or the nearest ancestor that declares it. */
export function findOption(cmd: Command, name: string): OptionLocation | undefined {
  for (let current: Command | null = cmd; current; current = current.parent) {
    const option = current.options.find((candidate) => candidate.long === `--${name}`);
    if (option) return { command: current, option };
  }
  return undefined;
}

function isFlagNameTaken(cmd: Command, name: string): boolean {
  const flag = `--${name}`;
  for (let current: Command | null = cmd; current; current = current.parent) {
    if (current.options.some((option) => option.long === flag || option.short === flag)) {
      return true;
    }
  }
  return false;
}

/**
 * Register `aliasName` as a hidden alias of the option `originalName` on `cmd`.
 * No-op when the original is not declared on `cmd`, is a negated flag, or when
 * the alias name is already in use on `cmd` or an ancestor.
 */
export function flagAlias(cmd: Command, originalName: string, aliasName: string): AliasOption | undefined {
  const original = cmd.options.find((option) => option.long === `--${originalName}`);
  if (!original || original.negate) return undefined;
  if (!aliasName || isFlagNameTaken(cmd, aliasName)) return undefined;

  const alias = new AliasOption(aliasName, original);
  cmd.addOption(alias);
  return alias;
}

export function getAliasOf(option: Option): string | undefined {
  return option instanceof AliasOption ? option.aliasOf : undefined;
}

/** True when the user set the flag (or one of its aliases) on the command line. */
export function isFlagChanged(cmd: Command, name: string): boolean {
  const found = findOption(cmd, name);
  if (!found) return false;
  return found.command.getOptionValueSource(found.option.attributeName()) === 'cli';
}

export function applyRootFlagAliases(
  root: Command,
  table: AliasTable = getFlagAliasTables().root,
): void {
  for (const [name, alias] of Object.entries(table)) {
    flagAlias(root, name, alias);
  }
}

/** Alias every declared option found in the common table, on every command in the tree. */
export function applyCommonFlagAliases(
  root: Command,
  table: AliasTable = getFlagAliasTables().common,
): void {
  const visit = (cmd: Command): void => {
    for (const option of [...cmd.options]) {
      if (option instanceof AliasOption || !option.long) continue;
      const name = option.long.slice(2);
      const alias = lookupAlias(table, name);
      if (alias) flagAlias(cmd, name, alias);
    }
    for (const sub of cmd.commands) visit(sub);
  };
  visit(root);
}
