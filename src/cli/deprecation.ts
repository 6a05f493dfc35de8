/**
 * Deprecation marks for commands and options. Commander keeps none of its own.
 * Nothing shipped is deprecated today; the marks exist so a renamed command or
 * flag can keep working while help-json and stderr point at its replacement.
 */
import type { Command, Option } from 'commander';
import type { OutputStream } from '../output/formatter.js';

const deprecatedOptions = new WeakMap<Option, string>();
const deprecatedCommands = new WeakMap<Command, string>();

/**
 * Mark the long option `name` on `cmd` as deprecated. The option keeps working,
 * is hidden from help and prints `message` when used. Returns false when `cmd`
 * declares no such option.
 */
export function deprecateOption(cmd: Command, name: string, message: string): boolean {
  const option = cmd.options.find((candidate) => candidate.long === `--${name}`);
  if (!option) return false;
  option.hideHelp();
  deprecatedOptions.set(option, message);
  return true;
}

export function deprecateCommand(cmd: Command, message: string): void {
  deprecatedCommands.set(cmd, message);
}

export function getOptionDeprecation(option: Option): string | undefined {
  return deprecatedOptions.get(option);
}

export function getCommandDeprecation(cmd: Command): string | undefined {
  return deprecatedCommands.get(cmd);
}

/** Warn about the deprecated command and every deprecated flag the user typed. */
export function warnDeprecatedUsage(actionCommand: Command, stderr: OutputStream = process.stderr): void {
  const path: Command[] = [];
  for (let current: Command | null = actionCommand; current; current = current.parent) {
    path.unshift(current);
  }

  for (const cmd of path) {
    const commandMessage = deprecatedCommands.get(cmd);
    if (commandMessage) {
      stderr.write(`Command "${cmd.name()}" is deprecated, ${commandMessage}\n`);
    }
    for (const option of cmd.options) {
      const message = deprecatedOptions.get(option);
      if (!message || !option.long) continue;
      if (cmd.getOptionValueSource(option.attributeName()) === 'cli') {
        stderr.write(`Flag ${option.long} has been deprecated, ${message}\n`);
      }
    }
  }
}
