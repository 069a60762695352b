/**
 * @description: Validates how requests map to completion plans and local actions.
 * @parley-scope: test
 * @parley-module: InteractionRouterTests
 * @parley-risk: low - Uses in-memory stores and bundled personas.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { Writable } from 'node:stream';

import { PersonaRegistry } from '@parley/shared';
import { transports } from 'winston';
import {
  ADMIN_ONLY_NOTICE,
  EMPTY_PROMPT_NOTICE,
  INVALID_REMINDER_TIME_NOTICE,
  InteractionRouter,
  SERVER_ADMIN_ONLY_NOTICE,
  UNKNOWN_TEXT_COMMAND_NOTICE
} from '../src/orchestrator/InteractionRouter.js';
import type { InteractionPlan, InteractionRequest, ReplyContent } from '../src/orchestrator/types.js';
import { ConversationContext } from '../src/state/ConversationContext.js';
import { SettingsResolver } from '../src/utils/SettingsResolver.js';
import { logger } from '../src/utils/logger.js';
import { InMemoryConversationStore, InMemoryReminderStore, InMemorySettingsStore, makeRequest } from './helpers.js';

const NOW = 1_000_000;

const setup = () => {
  const store = new InMemorySettingsStore();
  const context = new ConversationContext(new InMemoryConversationStore());
  const reminders = new InMemoryReminderStore();
  const router = new InteractionRouter({
    personas: new PersonaRegistry(),
    settingsStore: store,
    settings: new SettingsResolver(store),
    preferences: store,
    context,
    reminders,
    now: () => NOW
  });
  return { store, context, reminders, router };
};

const runLocal = async (plan: InteractionPlan): Promise<ReplyContent> => {
  assert.ok(plan.type === 'local', `expected a local plan, got ${plan.type}`);
  return plan.run();
};

const command = (name: string, fields: Record<string, string> = {}, overrides: Partial<InteractionRequest> = {}) =>
  makeRequest({ kind: 'command', name, fields, text: fields.prompt ?? '', ...overrides });

const typed = (text: string) => makeRequest({ kind: 'message', name: 'dm', guildId: null, text, fields: {} });

const guildRef = { scope: 'guild' as const, botId: 'bot-a', scopeId: 'guild-1' };

test('mentions and DMs become completions of the message text', () => {
  const { router } = setup();

  assert.deepEqual(router.plan(makeRequest({ kind: 'message', name: 'mention', text: '  what is a monad?  ', fields: {} })), {
    type: 'llm',
    prompt: 'what is a monad?',
    modifier: undefined
  });
});

test('prompt commands carry their modifier', () => {
  const { router } = setup();

  assert.deepEqual(router.plan(command('steps', { prompt: 'bake bread' })), {
    type: 'llm',
    prompt: 'bake bread',
    modifier: 'steps'
  });
  assert.deepEqual(router.plan(command('hey', { prompt: 'hi' })), { type: 'llm', prompt: 'hi', modifier: undefined });
});

test('an empty prompt is answered locally', async () => {
  const { router } = setup();

  const reply = await runLocal(router.plan(makeRequest({ kind: 'message', name: 'dm', text: '   ', fields: {} })));
  assert.equal(reply.content, EMPTY_PROMPT_NOTICE);
});

test('context menu entries analyze or explain the target', () => {
  const { router } = setup();

  assert.deepEqual(router.plan(makeRequest({ kind: 'context-menu', name: 'Explain Message', text: 'e = mc^2', fields: {} })), {
    type: 'llm',
    prompt: 'e = mc^2',
    modifier: 'explain'
  });
  const plan = router.plan(makeRequest({ kind: 'context-menu', name: 'Analyze User', text: 'Username: someone', fields: {} }));
  assert.ok(plan.type === 'llm');
  assert.equal(plan.modifier, 'analyze');
});

test('the prompt modal submission becomes a completion', () => {
  const { router } = setup();

  assert.deepEqual(router.plan(makeRequest({ kind: 'modal', name: 'ai_prompt_modal', text: '', fields: { prompt: 'why is the sky blue' } })), {
    type: 'llm',
    prompt: 'why is the sky blue',
    modifier: undefined
  });
});

test('feedback submissions are acknowledged and logged by length only', async () => {
  const { router } = setup();
  const lines: string[] = [];
  const capture = new transports.Stream({
    stream: new Writable({
      write(chunk, _encoding, callback) {
        lines.push(String(chunk));
        callback();
      }
    })
  });
  logger.add(capture);

  try {
    const reply = await runLocal(
      router.plan(makeRequest({ kind: 'modal', name: 'help_feedback_modal', text: '', fields: { feedback: 'more personas please' } }))
    );
    await new Promise((resolve) => setImmediate(resolve));

    assert.equal(reply.content, 'Thanks for the feedback!');
    const feedbackLines = lines.filter((line) => line.includes('Feedback received'));
    assert.equal(feedbackLines.length, 1);
    assert.ok(feedbackLines[0].includes('Feedback received (20 chars)'));
    assert.equal(feedbackLines[0].includes('more personas please'), false);
  } finally {
    logger.remove(capture);
  }
});

test('ping replies locally and ephemerally', async () => {
  const { router } = setup();
  const plan = router.plan(command('ping'));

  assert.ok(plan.type === 'local');
  assert.equal(plan.ephemeral, true);
  assert.deepEqual(await plan.run(), { content: 'Pong!' });
});

test('unknown commands get a local notice', async () => {
  const { router } = setup();

  assert.equal((await runLocal(router.plan(command('dance')))).content, 'Unknown command: dance');
});

test('help offers the prompt and feedback buttons', async () => {
  const { router } = setup();

  const reply = await runLocal(router.plan(command('help')));
  assert.deepEqual(reply.buttons, [
    { customId: 'open_prompt_modal', label: 'Ask a question' },
    { customId: 'open_feedback_modal', label: 'Send feedback' }
  ]);
});

test('the open prompt button answers with a modal, not ephemerally', async () => {
  const { router } = setup();
  const plan = router.plan(makeRequest({ kind: 'button', name: 'open_prompt_modal', text: '', fields: {} }));

  assert.ok(plan.type === 'local');
  assert.equal(plan.ephemeral, undefined);
  const reply = await plan.run();
  assert.equal(reply.modal?.customId, 'ai_prompt_modal');
  assert.deepEqual(reply.modal?.fields.map((field) => field.customId), ['prompt']);
});

test('personas lists every persona with a button each', async () => {
  const { router } = setup();

  const reply = await runLocal(router.plan(command('personas')));
  assert.equal(reply.content.split('\n')[1], '**Step-by-Step Analyst** (`analyst`): An analyst who breaks things down into clear steps');
  assert.deepEqual(reply.buttons?.map((button) => button.customId), [
    'persona_analyst',
    'persona_chef',
    'persona_muppet',
    'persona_obi',
    'persona_teacher'
  ]);
});

test('set_persona stores the preference for this bot and user', async () => {
  const { router, store } = setup();

  const reply = await runLocal(router.plan(command('set_persona', { persona: 'chef' })));
  assert.equal(reply.content, 'Persona set to **Chef**.');
  assert.equal(await store.getPersona('bot-a', 'user-1'), 'chef');
});

test('persona buttons set the persona too', async () => {
  const { router, store } = setup();

  await runLocal(router.plan(makeRequest({ kind: 'button', name: 'persona_teacher', text: '', fields: {} })));
  assert.equal(await store.getPersona('bot-a', 'user-1'), 'teacher');
});

test('names inherited from Object are not personas', async () => {
  const { router, store } = setup();
  const refusal = 'Unknown persona "constructor". Use /personas to see the options.';

  const fromSetting = await runLocal(
    router.plan(command('set_guild_setting', { key: 'persona', value: 'constructor' }, { isAdmin: true }))
  );
  assert.equal(fromSetting.content, refusal);
  assert.equal(await store.get(guildRef, 'persona'), undefined);

  const fromButton = await runLocal(router.plan(makeRequest({ kind: 'button', name: 'persona_constructor', text: '', fields: {} })));
  assert.equal(fromButton.content, refusal);
  assert.equal(await store.getPersona('bot-a', 'user-1'), undefined);
});

test('an unknown persona is refused', async () => {
  const { router, store } = setup();

  const reply = await runLocal(router.plan(command('set_persona', { persona: 'pirate' })));
  assert.equal(reply.content, 'Unknown persona "pirate". Use /personas to see the options.');
  assert.equal(await store.getPersona('bot-a', 'user-1'), undefined);
});

test('forget clears this channel and reports the count', async () => {
  const { router, context } = setup();
  const identity = { botId: 'bot-a', userId: 'user-1', channelId: 'channel-1' };
  await context.append(identity, { role: 'user', content: 'hi', timestamp: 1 });
  await context.append(identity, { role: 'assistant', content: 'hello', timestamp: 2 });

  assert.equal((await runLocal(router.plan(command('forget')))).content, 'Forgot 2 messages from this channel.');
  assert.equal((await runLocal(router.plan(command('forget')))).content, 'There was nothing to forget.');
});

test('settings shows each effective value and its source', async () => {
  const { router, store } = setup();
  await store.set({ scope: 'guild', botId: 'bot-a', scopeId: 'guild-1' }, 'verbosity', 'detailed');
  await store.setPersona('bot-a', 'user-1', 'chef');

  const reply = await runLocal(router.plan(command('settings', {}, { isAdmin: true })));
  assert.deepEqual(reply.content.split('\n'), [
    '`verbosity`: detailed (guild)',
    '`persona`: muppet (default)',
    '`max_context_messages`: 40 (default)',
    '`mention_responses`: enabled (default)',
    'Your persona: chef'
  ]);
});

test('settings are only shown to settings managers', async () => {
  const { router } = setup();

  assert.equal((await runLocal(router.plan(command('settings')))).content, ADMIN_ONLY_NOTICE);
});

test('channel verbosity requires Manage Server', async () => {
  const { router, store } = setup();
  const ref = { scope: 'channel' as const, botId: 'bot-a', scopeId: 'channel-1' };

  assert.equal((await runLocal(router.plan(command('set_channel_verbosity', { level: 'concise' })))).content, ADMIN_ONLY_NOTICE);
  assert.equal(await store.get(ref, 'verbosity'), undefined);

  const reply = await runLocal(router.plan(command('set_channel_verbosity', { level: 'concise' }, { isAdmin: true })));
  assert.equal(reply.content, 'Verbosity for this channel set to **concise**.');
  assert.equal(await store.get(ref, 'verbosity'), 'concise');
});

test('guild settings are validated before they are stored', async () => {
  const { router, store } = setup();
  const ref = { scope: 'guild' as const, botId: 'bot-a', scopeId: 'guild-1' };
  const admin = { isAdmin: true };

  assert.equal(
    (await runLocal(router.plan(command('set_guild_setting', { key: 'verbosity', value: 'normal' }, { ...admin, guildId: null })))).content,
    'Server settings can only be changed inside a server.'
  );
  assert.equal(
    (await runLocal(router.plan(command('set_guild_setting', { key: 'max_context_messages', value: '500' }, admin)))).content,
    '"500" is not a valid value for max_context_messages.'
  );
  assert.equal(
    (await runLocal(router.plan(command('set_guild_setting', { key: 'persona', value: 'pirate' }, admin)))).content,
    'Unknown persona "pirate". Use /personas to see the options.'
  );

  const reply = await runLocal(router.plan(command('set_guild_setting', { key: 'max_context_messages', value: '25' }, admin)));
  assert.equal(reply.content, 'Server default for `max_context_messages` set to **25**.');
  assert.equal(await store.get(ref, 'max_context_messages'), '25');
});

test('channel verbosity can target another channel', async () => {
  const { router, store } = setup();

  const reply = await runLocal(
    router.plan(command('set_channel_verbosity', { level: 'detailed', channel: 'channel-9' }, { isAdmin: true }))
  );
  assert.equal(reply.content, 'Verbosity for <#channel-9> set to **detailed**.');
  assert.equal(await store.get({ scope: 'channel', botId: 'bot-a', scopeId: 'channel-9' }, 'verbosity'), 'detailed');
  assert.equal(await store.get({ scope: 'channel', botId: 'bot-a', scopeId: 'channel-1' }, 'verbosity'), undefined);
});

test('only server administrators choose the bot admin role', async () => {
  const { router, store } = setup();

  assert.equal(
    (await runLocal(router.plan(command('admin_role', { role: '4242' }, { isAdmin: true })))).content,
    SERVER_ADMIN_ONLY_NOTICE
  );
  assert.equal(await store.get(guildRef, 'admin_role'), undefined);

  const reply = await runLocal(router.plan(command('admin_role', { role: '4242' }, { isAdmin: true, isServerAdmin: true })));
  assert.equal(reply.content, 'Members with <@&4242> can now manage bot settings.');
  assert.equal(await store.get(guildRef, 'admin_role'), '4242');
});

test('members of the bot admin role can manage settings without Manage Server', async () => {
  const { router, store } = setup();
  await store.set(guildRef, 'admin_role', '4242');

  assert.equal(
    (await runLocal(router.plan(command('set_channel_verbosity', { level: 'concise' }, { roleIds: ['1111'] })))).content,
    ADMIN_ONLY_NOTICE
  );

  const reply = await runLocal(router.plan(command('set_guild_setting', { key: 'verbosity', value: 'detailed' }, { roleIds: ['1111', '4242'] })));
  assert.equal(reply.content, 'Server default for `verbosity` set to **detailed**.');

  const settings = await runLocal(router.plan(command('settings', {}, { roleIds: ['4242'] })));
  assert.equal(settings.content.split('\n').at(-1), 'Bot admin role: <@&4242>');
});

test('typed commands in messages run like their slash versions', async () => {
  const { router, store } = setup();

  assert.deepEqual(await runLocal(router.plan(typed('!ping'))), { content: 'Pong!' });
  assert.equal((await runLocal(router.plan(typed('!set_persona Chef')))).content, 'Persona set to **Chef**.');
  assert.equal(await store.getPersona('bot-a', 'user-1'), 'chef');
  assert.deepEqual(router.plan(typed('/hey what is a monad?')), { type: 'llm', prompt: 'what is a monad?', modifier: undefined });
  assert.deepEqual(router.plan(typed('!STEPS bake bread')), { type: 'llm', prompt: 'bake bread', modifier: 'steps' });
});

test('unknown typed commands point at help', async () => {
  const { router } = setup();

  assert.equal((await runLocal(router.plan(typed('!dance now')))).content, UNKNOWN_TEXT_COMMAND_NOTICE);
  assert.equal((await runLocal(router.plan(typed('/set_guild_setting verbosity concise')))).content, UNKNOWN_TEXT_COMMAND_NOTICE);
});

test('remind stores a reminder due after the given delay', async () => {
  const { router, reminders } = setup();

  const reply = await runLocal(router.plan(command('remind', { time: '1h30m', message: 'stretch' })));
  assert.equal(reply.content, 'Reminder #1 set for <t:6400:R>: **stretch**');
  assert.deepEqual(await reminders.listPending('bot-a', 'user-1'), [
    {
      id: 1,
      botId: 'bot-a',
      userId: 'user-1',
      channelId: 'channel-1',
      guildId: 'guild-1',
      message: 'stretch',
      dueAt: NOW + 90 * 60_000,
      createdAt: NOW
    }
  ]);
});

test('remind refuses bad delays, empty messages and too many reminders', async () => {
  const { router, reminders } = setup();

  assert.equal((await runLocal(router.plan(command('remind', { time: 'soon', message: 'x' })))).content, INVALID_REMINDER_TIME_NOTICE);
  assert.equal((await runLocal(router.plan(command('remind', { time: '31d', message: 'x' })))).content, INVALID_REMINDER_TIME_NOTICE);
  assert.equal((await runLocal(router.plan(command('remind', { time: '5m', message: '  ' })))).content, 'Tell me what to remind you about.');

  for (let i = 0; i < 25; i += 1) {
    await reminders.create({
      botId: 'bot-a',
      userId: 'user-1',
      channelId: 'channel-1',
      guildId: 'guild-1',
      message: `task ${i}`,
      dueAt: NOW + 60_000,
      createdAt: NOW
    });
  }
  assert.equal(
    (await runLocal(router.plan(command('remind', { time: '5m', message: 'one more' })))).content,
    'You already have 25 pending reminders. Cancel one with /reminders first.'
  );
});

test('reminders lists and cancels only your own reminders', async () => {
  const { router, reminders } = setup();
  await runLocal(router.plan(command('remind', { time: '10m', message: 'tea' })));
  await reminders.create({
    botId: 'bot-a',
    userId: 'user-2',
    channelId: 'channel-1',
    guildId: 'guild-1',
    message: 'not yours',
    dueAt: NOW + 60_000,
    createdAt: NOW
  });

  assert.equal((await runLocal(router.plan(command('reminders')))).content, 'Your pending reminders:\n#1 <t:1600:R>: tea');
  assert.equal(
    (await runLocal(router.plan(command('reminders', { action: 'cancel', id: '2' })))).content,
    'You have no pending reminder #2.'
  );
  assert.equal((await runLocal(router.plan(command('reminders', { action: 'cancel', id: '1' })))).content, 'Reminder #1 cancelled.');
  assert.equal((await runLocal(router.plan(command('reminders', { action: 'list' })))).content, 'You have no pending reminders.');
  assert.equal(
    (await runLocal(router.plan(command('reminders', { action: 'cancel' })))).content,
    'Give the id of the reminder to cancel, e.g. `/reminders action:cancel id:3`.'
  );
});

test('typed remind and reminders take positional arguments', async () => {
  const { router } = setup();

  assert.equal((await runLocal(router.plan(typed('!remind 10m drink water')))).content, 'Reminder #1 set for <t:1600:R>: **drink water**');
  assert.equal((await runLocal(router.plan(typed('!reminders cancel 1')))).content, 'Reminder #1 cancelled.');
});
