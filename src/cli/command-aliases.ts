import type { Command } from 'commander';
import { getCommandAliasTables, lookupAlias, type CommandAliasTables } from './alias-tables.js';
import { singularize } from './singularize.js';

function nameAndAliases(cmd: Command): string[] {
  return [cmd.name(), ...cmd.aliases()];
}

/**
 * Append `alias` to `cmd` unless it is empty, is the command's own name, is
 * already present, or is the name or alias of a sibling. Rejections are silent.
 */
export function addAliasIfSafe(cmd: Command, alias: string): boolean {
  if (!alias || alias === cmd.name() || cmd.aliases().includes(alias)) {
    return false;
  }
  const parent = cmd.parent;
  if (parent) {
    for (const sibling of parent.commands) {
      if (sibling === cmd) continue;
      if (nameAndAliases(sibling).includes(alias)) return false;
    }
  }
  cmd.alias(alias);
  return true;
}

function addCommandAliases(cmd: Command, root: Command, tables: CommandAliasTables): void {
  const name = cmd.name();
  if (!name) return;

  for (const alias of lookupAlias(tables.verbs, name) ?? []) {
    addAliasIfSafe(cmd, alias);
  }

  if (cmd.parent === root) {
    const singular = singularize(name);
    if (singular && singular !== name) {
      addAliasIfSafe(cmd, singular);
    }
    for (const alias of lookupAlias(tables.resources, name) ?? []) {
      addAliasIfSafe(cmd, alias);
    }
  }
}

/**
 * Walk the tree depth-first (node before children) and attach verb aliases at
 * every level, plus singular and resource aliases on the root's direct children.
 * Running it twice adds nothing new.
 */
export function applyCommandAliases(
  root: Command,
  tables: CommandAliasTables = getCommandAliasTables(),
): Command {
  const visit = (cmd: Command): void => {
    addCommandAliases(cmd, root, tables);
    for (const sub of cmd.commands) visit(sub);
  };
  visit(root);
  return root;
}
