import { Command } from 'commander';
import { describe, it, expect } from 'vitest';
import { deprecateCommand, deprecateOption } from '../cli/deprecation.js';
import { buildHelpCommand, findCommand, type HelpCommand } from '../cli/help-json.js';
import { createProgram } from '../cli/program.js';
import type { Resource } from '../cli/resources.js';
import { NotFoundError } from '../lib/errors.js';
import { captureStream } from './helpers/fakes.js';

const orders: Resource = {
  name: 'orders',
  path: '/orders',
  idPrefix: 'order',
  description: 'Manage orders',
  columns: ['id', 'status'],
  listFlags: ['status', 'customer-id'],
  deletable: false,
};

function buildProgram() {
  const out = captureStream();
  const program = createProgram({ env: {}, out, resources: [orders] });
  return { program, out };
}

function flag(help: HelpCommand, name: string) {
  return help.flags.find((candidate) => candidate.name === name);
}

describe('buildHelpCommand', () => {
  it('describes root flags as persistent and reports root aliases', () => {
    const { program } = buildProgram();
    const help = buildHelpCommand(program);

    expect(help.name).toBe('spl');
    expect(flag(help, 'json')).toEqual({
      name: 'json',
      type: 'bool',
      usage: 'Shorthand for --output json',
      required: false,
      deprecated: false,
      persistent: true,
      hidden: false,
    });
    expect(flag(help, 'j')).toEqual({
      name: 'j',
      type: 'bool',
      usage: '',
      required: false,
      deprecated: false,
      persistent: true,
      hidden: true,
      aliasOf: 'json',
    });
    expect(flag(help, 'limit')).toMatchObject({ shorthand: 'l', type: 'int' });
    expect(flag(help, 'output')).toMatchObject({ shorthand: 'o', default: 'text', type: 'string' });
    expect(flag(help, 'output-mode')?.hidden).toBe(true);
  });

  it('lists subcommands with their aliases', () => {
    const { program } = buildProgram();
    const help = buildHelpCommand(program);

    const ordersHelp = help.subcommands.find((sub) => sub.name === 'orders');
    expect(ordersHelp?.aliases).toEqual(['order', 'ord', 'o']);
    expect(ordersHelp?.hidden).toBe(false);
    expect(ordersHelp?.subcommands.map((sub) => sub.name)).toEqual(['list', 'get']);
  });

  it('reports local aliases with the original flag name', () => {
    const { program } = buildProgram();
    const help = buildHelpCommand(findCommand(program, ['orders', 'list']));

    expect(flag(help, 'ps')).toEqual({
      name: 'ps',
      type: 'int',
      usage: '',
      required: false,
      deprecated: false,
      persistent: false,
      hidden: true,
      aliasOf: 'page-size',
    });
    expect(flag(help, 'cid')?.aliasOf).toBe('customer-id');
    expect(flag(help, 'status')?.hidden).toBe(false);
  });

  it('renders argument placeholders in use', () => {
    const { program } = buildProgram();

    expect(buildHelpCommand(findCommand(program, ['orders', 'get'])).use).toBe('get <id>');
    expect(buildHelpCommand(findCommand(program, ['help-json'])).use).toBe('help-json [command...]');
  });

  it('marks hidden commands', () => {
    const root = new Command('spl');
    root.command('secret', { hidden: true });

    expect(buildHelpCommand(root).subcommands[0].hidden).toBe(true);
  });
});

describe('deprecation', () => {
  it('reports deprecated commands and flags', () => {
    const root = new Command('spl');
    const old = root.command('old-cmd').option('--old-flag <value>', 'Old flag');
    deprecateCommand(old, 'use new-cmd instead');
    deprecateOption(old, 'old-flag', 'use new-flag instead');

    const help = buildHelpCommand(root);
    const oldHelp = help.subcommands[0];

    expect(help.deprecated).toBeUndefined();
    expect(oldHelp.deprecated).toBe('use new-cmd instead');
    expect(flag(oldHelp, 'old-flag')).toMatchObject({ deprecated: true, hidden: true });
  });
});

describe('findCommand', () => {
  it('follows aliases', () => {
    const { program } = buildProgram();

    expect(findCommand(program, ['o', 'ls']).name()).toBe('list');
    expect(findCommand(program, [])).toBe(program);
  });

  it('rejects unknown paths', () => {
    const { program } = buildProgram();

    expect(() => findCommand(program, ['orders', 'nope'])).toThrow(NotFoundError);
    expect(() => findCommand(program, ['orders', 'nope'])).toThrow('unknown command "orders nope"');
  });
});

describe('help-json command', () => {
  it('prints the metadata of the requested command', async () => {
    const { program, out } = buildProgram();

    await program.parseAsync(['help-json', 'o', 'l'], { from: 'user' });

    const printed: unknown = JSON.parse(out.text());
    expect(printed).toMatchObject({ name: 'list', use: 'list', aliases: ['ls', 'l'] });
  });
});
