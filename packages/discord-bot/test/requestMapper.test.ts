/**
 * @description: Covers the pure helpers that normalize inbound Discord payloads.
 * @parley-scope: test
 * @parley-module: RequestMapperTests
 * @parley-risk: low - No discord.js client objects are constructed.
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { ApplicationCommandOptionType } from 'discord.js';
import { memberRoleIds, optionsToFields, stripBotMention } from '../src/adapters/requestMapper.js';

test('stripBotMention removes both mention forms and tidies whitespace', () => {
  assert.equal(stripBotMention('<@1234> hello   there <@!1234>', '1234'), 'hello there');
  assert.equal(stripBotMention('hey <@5678> and <@1234>', '1234'), 'hey <@5678> and');
});

test('optionsToFields flattens subcommand options to strings', () => {
  assert.deepEqual(
    optionsToFields([
      { name: 'prompt', type: ApplicationCommandOptionType.String, value: 'why?' },
      {
        name: 'group',
        type: ApplicationCommandOptionType.Subcommand,
        options: [
          { name: 'count', type: ApplicationCommandOptionType.Integer, value: 3 },
          { name: 'loud', type: ApplicationCommandOptionType.Boolean, value: false }
        ]
      }
    ]),
    { prompt: 'why?', count: '3', loud: 'false' }
  );
});

test('memberRoleIds reads cached and raw members alike', () => {
  assert.deepEqual(memberRoleIds({ roles: ['role-1', 'role-2'] }), ['role-1', 'role-2']);
  assert.deepEqual(memberRoleIds({ roles: { cache: new Map([['role-3', {}]]) } }), ['role-3']);
  assert.deepEqual(memberRoleIds(null), []);
});
