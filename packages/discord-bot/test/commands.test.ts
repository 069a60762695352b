/**
 * @description: Verifies the registered command set and how it is deployed.
 * @parley-scope: test
 * @parley-module: CommandTests
 * @parley-risk: low - Uses a fake REST registrar.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { ApplicationCommandType } from 'discord.js';
import { PersonaRegistry } from '@parley/shared';
import { buildCommandDefinitions } from '../src/commands/definitions.js';
import { CommandHandler, type CommandRegistrar } from '../src/utils/commandHandler.js';

class FakeRegistrar implements CommandRegistrar {
  readonly puts: Array<{ route: string; body: unknown }> = [];
  fail = false;

  async put(route: `/${string}`, options: { body: unknown }): Promise<unknown> {
    if (this.fail) throw new Error('401: Unauthorized');
    this.puts.push({ route, body: options.body });
    return Array.isArray(options.body) ? options.body : [];
  }
}

const definitions = () => buildCommandDefinitions(new PersonaRegistry().listPersonas());

test('every prompt, utility and context menu command is defined', () => {
  assert.deepEqual(
    definitions().map((command) => command.name),
    [
      'hey',
      'explain',
      'simple',
      'steps',
      'recipe',
      'ping',
      'help',
      'personas',
      'set_persona',
      'forget',
      'remind',
      'reminders',
      'settings',
      'set_channel_verbosity',
      'set_guild_setting',
      'admin_role',
      'Analyze Message',
      'Explain Message',
      'Analyze User'
    ]
  );
});

test('settings commands default to Manage Server', () => {
  const byName = new Map(definitions().map((command) => [command.name, command]));

  assert.equal(byName.get('settings')?.default_member_permissions, '32');
  assert.equal(byName.get('set_channel_verbosity')?.default_member_permissions, '32');
  assert.equal(byName.get('set_guild_setting')?.default_member_permissions, '32');
  assert.equal(byName.get('hey')?.default_member_permissions, undefined);
  assert.equal(byName.get('remind')?.default_member_permissions, undefined);
});

test('only administrators see admin_role by default', () => {
  const byName = new Map(definitions().map((command) => [command.name, command]));

  assert.equal(byName.get('admin_role')?.default_member_permissions, '8');
});

test('channel verbosity can target another channel', () => {
  const command = definitions().find((definition) => definition.name === 'set_channel_verbosity');

  assert.deepEqual(
    command?.options?.map((option) => [option.name, option.required ?? false]),
    [
      ['level', true],
      ['channel', false]
    ]
  );
});

test('context menu entries target messages or users', () => {
  const byName = new Map(definitions().map((command) => [command.name, command]));

  assert.equal(byName.get('Explain Message')?.type, ApplicationCommandType.Message);
  assert.equal(byName.get('Analyze User')?.type, ApplicationCommandType.User);
});

test('guild deployment targets the guild route', async () => {
  const registrar = new FakeRegistrar();
  const commands = definitions();

  await new CommandHandler('test-token', registrar).deployCommands(commands, 'app-1', 'guild-1');

  assert.equal(registrar.puts[0].route, '/applications/app-1/guilds/guild-1/commands');
  assert.equal(registrar.puts[0].body, commands);
});

test('global deployment targets the application route', async () => {
  const registrar = new FakeRegistrar();

  await new CommandHandler('test-token', registrar).deployCommands(definitions(), 'app-1');

  assert.equal(registrar.puts[0].route, '/applications/app-1/commands');
});

test('registration failures propagate', async () => {
  const registrar = new FakeRegistrar();
  registrar.fail = true;

  await assert.rejects(new CommandHandler('test-token', registrar).deployCommands([], 'app-1'), /Unauthorized/);
});
