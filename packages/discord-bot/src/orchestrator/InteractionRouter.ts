/**
 * @parley-module: InteractionRouter
 * @parley-risk: moderate
 * @parley-scope: core
 *
 * @description
 * Maps each request to a plan: a language-model completion, or a local action
 * whose reply is ready within the acknowledgment window (ping, help, persona
 * and settings management, reminders, conversation reset). Messages that start
 * with `!` or `/` are treated as typed commands.
 */

import { TimestampStyles, time } from 'discord.js';
import type {
  PersonaPreferenceStore,
  PersonaRegistry,
  PromptModifier,
  ReminderStore,
  SettingScopeRef,
  SettingsStore
} from '@parley/shared';
import { isVerbosity } from '@parley/shared';
import {
  CONTEXT_MENU_COMMANDS,
  FEEDBACK_MODAL_ID,
  FEEDBACK_MODAL_INPUT,
  OPEN_FEEDBACK_MODAL_BUTTON,
  OPEN_PROMPT_MODAL_BUTTON,
  PERSONA_BUTTON_PREFIX,
  PROMPT_COMMANDS,
  PROMPT_MODAL_ID,
  PROMPT_MODAL_INPUT
} from '../commands/definitions.js';
import { TEXT_COMMAND_NAMES, parseTextCommand, textCommandFields } from '../commands/textCommands.js';
import { parseReminderDelay } from '../reminders/reminderDelay.js';
import { ConversationContext } from '../state/ConversationContext.js';
import { createModuleLogger } from '../utils/logger.js';
import {
  SETTING_KEYS,
  SettingsResolver,
  isSettingKey,
  parseSettingValue
} from '../utils/SettingsResolver.js';
import type {
  InteractionPlan,
  InteractionPlanner,
  InteractionRequest,
  LocalPlan,
  ReplyContent
} from './types.js';

const routerLogger = createModuleLogger('interactionRouter');

export interface InteractionRouterDependencies {
  personas: PersonaRegistry;
  settingsStore: SettingsStore;
  settings: SettingsResolver;
  preferences: PersonaPreferenceStore;
  context: ConversationContext;
  reminders: ReminderStore;
  now?: () => number;
}

const reply = (content: string, extras: Omit<ReplyContent, 'content'> = {}): ReplyContent => ({ content, ...extras });

const localReply = (content: string, ephemeral = true): LocalPlan => ({
  type: 'local',
  ephemeral,
  run: async () => reply(content)
});

export const EMPTY_PROMPT_NOTICE = 'Please include something for me to respond to.';
export const ADMIN_ONLY_NOTICE = 'You need the Manage Server permission or the bot admin role to manage settings.';
export const SERVER_ADMIN_ONLY_NOTICE = 'Only server administrators can choose the bot admin role.';
export const UNKNOWN_TEXT_COMMAND_NOTICE = 'Unknown command. Use `/help` to see available commands.';
export const INVALID_REMINDER_TIME_NOTICE =
  'Use a time like `30m`, `2h`, `1d` or `1h30m`, between one minute and 30 days.';

/** Guild-scope setting holding the role id that may manage settings without Manage Server. */
export const ADMIN_ROLE_SETTING = 'admin_role';
export const MAX_PENDING_REMINDERS = 25;
export const MAX_REMINDER_LENGTH = 500;

const relativeTime = (epochMs: number): string => time(new Date(epochMs), TimestampStyles.RelativeTime);

export class InteractionRouter implements InteractionPlanner {
  private readonly now: () => number;

  constructor(private readonly deps: InteractionRouterDependencies) {
    this.now = deps.now ?? Date.now;
  }

  public plan(request: InteractionRequest): InteractionPlan {
    switch (request.kind) {
      case 'message':
        return this.planMessage(request);
      case 'command':
        return this.planCommand(request);
      case 'context-menu':
        return this.planContextMenu(request);
      case 'modal':
        return this.planModal(request);
      case 'button':
        return this.planButton(request);
    }
  }

  private planMessage(request: InteractionRequest): InteractionPlan {
    const command = parseTextCommand(request.text);
    if (!command) {
      return this.promptPlan(request.text);
    }
    if (!TEXT_COMMAND_NAMES.has(command.name)) {
      routerLogger.debug(`Unknown text command "${command.name}"`);
      return localReply(UNKNOWN_TEXT_COMMAND_NOTICE);
    }

    const fields = textCommandFields(command);
    return this.planCommand({ ...request, name: command.name, fields, text: fields.prompt ?? '' });
  }

  private planCommand(request: InteractionRequest): InteractionPlan {
    const { name } = request;

    if (Object.prototype.hasOwnProperty.call(PROMPT_COMMANDS, name)) {
      return this.promptPlan(request.fields.prompt ?? request.text, PROMPT_COMMANDS[name]);
    }

    switch (name) {
      case 'ping':
        return localReply('Pong!');
      case 'help':
        return { type: 'local', ephemeral: true, run: async () => this.helpReply() };
      case 'personas':
        return { type: 'local', ephemeral: true, run: async () => this.personasReply() };
      case 'set_persona':
        return { type: 'local', ephemeral: true, run: () => this.setPersona(request, request.fields.persona ?? '') };
      case 'forget':
        return { type: 'local', ephemeral: true, run: () => this.forget(request) };
      case 'settings':
        return { type: 'local', ephemeral: true, run: () => this.describeSettings(request) };
      case 'set_channel_verbosity':
        return { type: 'local', ephemeral: true, run: () => this.setChannelVerbosity(request) };
      case 'set_guild_setting':
        return { type: 'local', ephemeral: true, run: () => this.setGuildSetting(request) };
      case 'admin_role':
        return { type: 'local', ephemeral: true, run: () => this.setAdminRole(request) };
      case 'remind':
        return { type: 'local', ephemeral: true, run: () => this.remind(request) };
      case 'reminders':
        return { type: 'local', ephemeral: true, run: () => this.manageReminders(request) };
      default:
        return this.unknown(request);
    }
  }

  private planContextMenu(request: InteractionRequest): InteractionPlan {
    switch (request.name) {
      case CONTEXT_MENU_COMMANDS.analyzeMessage:
      case CONTEXT_MENU_COMMANDS.analyzeUser:
        return this.promptPlan(request.text, 'analyze');
      case CONTEXT_MENU_COMMANDS.explainMessage:
        return this.promptPlan(request.text, 'explain');
      default:
        return this.unknown(request);
    }
  }

  private planModal(request: InteractionRequest): InteractionPlan {
    switch (request.name) {
      case PROMPT_MODAL_ID:
        return this.promptPlan(request.fields[PROMPT_MODAL_INPUT] ?? '');
      case FEEDBACK_MODAL_ID: {
        const feedback = (request.fields[FEEDBACK_MODAL_INPUT] ?? '').trim();
        return {
          type: 'local',
          ephemeral: true,
          run: async () => {
            routerLogger.info(`Feedback received (${feedback.length} chars)`);
            return reply('Thanks for the feedback!');
          }
        };
      }
      default:
        return this.unknown(request);
    }
  }

  private planButton(request: InteractionRequest): InteractionPlan {
    const { name } = request;

    if (name.startsWith(PERSONA_BUTTON_PREFIX)) {
      const persona = name.slice(PERSONA_BUTTON_PREFIX.length);
      return { type: 'local', ephemeral: true, run: () => this.setPersona(request, persona) };
    }

    switch (name) {
      case OPEN_PROMPT_MODAL_BUTTON:
        return {
          type: 'local',
          run: async () =>
            reply('Open the prompt form to ask a question.', {
              modal: {
                customId: PROMPT_MODAL_ID,
                title: 'Ask a question',
                fields: [{ customId: PROMPT_MODAL_INPUT, label: 'Your question', style: 'paragraph', required: true, maxLength: 4000 }]
              }
            })
        };
      case OPEN_FEEDBACK_MODAL_BUTTON:
        return {
          type: 'local',
          run: async () =>
            reply('Open the feedback form to send feedback.', {
              modal: {
                customId: FEEDBACK_MODAL_ID,
                title: 'Send feedback',
                fields: [{ customId: FEEDBACK_MODAL_INPUT, label: 'Feedback', style: 'paragraph', required: true, maxLength: 1000 }]
              }
            })
        };
      default:
        return this.unknown(request);
    }
  }

  private promptPlan(prompt: string, modifier?: PromptModifier): InteractionPlan {
    const trimmed = prompt.trim();
    if (!trimmed) {
      return localReply(EMPTY_PROMPT_NOTICE);
    }
    return { type: 'llm', prompt: trimmed, modifier };
  }

  private unknown(request: InteractionRequest): InteractionPlan {
    routerLogger.warn(`No handler for ${request.kind} "${request.name}"`);
    return localReply(`Unknown command: ${request.name}`);
  }

  private helpReply(): ReplyContent {
    const lines = [
      '**Talk to me**',
      'Mention me or send a direct message, or use one of these commands:',
      '`/hey` ask anything',
      '`/explain`, `/simple`, `/steps`, `/recipe` ask with a specific style',
      '',
      '**Personalize**',
      '`/personas` list personas, `/set_persona` pick one',
      '`/forget` clear our conversation in this channel',
      '',
      '**Reminders**',
      '`/remind` set a reminder, `/reminders` list or cancel them',
      '',
      '**Admins**',
      '`/settings`, `/set_channel_verbosity`, `/set_guild_setting`, `/admin_role`',
      '',
      'In a DM or after a mention you can also type commands, e.g. `!help` or `/hey what is a monad?`'
    ];
    return reply(lines.join('\n'), {
      buttons: [
        { customId: OPEN_PROMPT_MODAL_BUTTON, label: 'Ask a question' },
        { customId: OPEN_FEEDBACK_MODAL_BUTTON, label: 'Send feedback' }
      ]
    });
  }

  private personasReply(): ReplyContent {
    const personas = this.deps.personas.listPersonas();
    const lines = personas.map((persona) => `**${persona.name}** (\`${persona.key}\`): ${persona.description}`);
    return reply(['Available personas:', ...lines].join('\n'), {
      buttons: personas.slice(0, 25).map((persona) => ({
        customId: `${PERSONA_BUTTON_PREFIX}${persona.key}`,
        label: persona.name
      }))
    });
  }

  private async setPersona(request: InteractionRequest, rawPersona: string): Promise<ReplyContent> {
    const key = rawPersona.trim().toLowerCase();
    const persona = this.deps.personas.getPersona(key);
    if (!persona) {
      return reply(`Unknown persona "${key}". Use /personas to see the options.`);
    }

    const { botId, userId } = request.identity;
    await this.deps.preferences.setPersona(botId, userId, persona.key);
    return reply(`Persona set to **${persona.name}**.`);
  }

  private async forget(request: InteractionRequest): Promise<ReplyContent> {
    const removed = await this.deps.context.clear(request.identity);
    return reply(removed === 0 ? 'There was nothing to forget.' : `Forgot ${removed} message${removed === 1 ? '' : 's'} from this channel.`);
  }

  /**
   * Manage Server, or membership of the guild's configured bot admin role.
   */
  private async canManageSettings(request: InteractionRequest): Promise<boolean> {
    if (request.isAdmin) {
      return true;
    }
    if (!request.guildId || request.roleIds.length === 0) {
      return false;
    }
    const adminRole = await this.deps.settingsStore.get(this.guildRef(request, request.guildId), ADMIN_ROLE_SETTING);
    return adminRole !== undefined && request.roleIds.includes(adminRole);
  }

  private guildRef(request: InteractionRequest, guildId: string): SettingScopeRef {
    return { scope: 'guild', botId: request.identity.botId, scopeId: guildId };
  }

  private async describeSettings(request: InteractionRequest): Promise<ReplyContent> {
    if (!(await this.canManageSettings(request))) {
      return reply(ADMIN_ONLY_NOTICE);
    }

    const { botId, channelId } = request.identity;
    const lines: string[] = [];
    for (const key of SETTING_KEYS) {
      const resolved = await this.deps.settings.describe(key, botId, channelId, request.guildId);
      lines.push(`\`${key}\`: ${String(resolved.value)} (${resolved.source})`);
    }

    const preferred = await this.deps.preferences.getPersona(botId, request.identity.userId);
    if (preferred) {
      lines.push(`Your persona: ${preferred}`);
    }
    if (request.guildId) {
      const adminRole = await this.deps.settingsStore.get(this.guildRef(request, request.guildId), ADMIN_ROLE_SETTING);
      if (adminRole) {
        lines.push(`Bot admin role: <@&${adminRole}>`);
      }
    }
    return reply(lines.join('\n'));
  }

  private async setChannelVerbosity(request: InteractionRequest): Promise<ReplyContent> {
    if (!(await this.canManageSettings(request))) {
      return reply(ADMIN_ONLY_NOTICE);
    }

    const level = (request.fields.level ?? '').trim().toLowerCase();
    if (!isVerbosity(level)) {
      return reply(`"${level}" is not a verbosity level. Use concise, normal or detailed.`);
    }

    const target = request.fields.channel?.trim();
    const channelId = target || request.identity.channelId;
    await this.deps.settingsStore.set({ scope: 'channel', botId: request.identity.botId, scopeId: channelId }, 'verbosity', level);
    return reply(`Verbosity for ${target ? `<#${target}>` : 'this channel'} set to **${level}**.`);
  }

  private async setGuildSetting(request: InteractionRequest): Promise<ReplyContent> {
    if (!(await this.canManageSettings(request))) {
      return reply(ADMIN_ONLY_NOTICE);
    }
    if (!request.guildId) {
      return reply('Server settings can only be changed inside a server.');
    }

    const key = (request.fields.key ?? '').trim();
    if (!isSettingKey(key)) {
      return reply(`Unknown setting "${key}". Valid settings: ${SETTING_KEYS.join(', ')}.`);
    }

    const value = parseSettingValue(key, request.fields.value ?? '');
    if (value === undefined) {
      return reply(`"${request.fields.value ?? ''}" is not a valid value for ${key}.`);
    }
    if (key === 'persona' && !this.deps.personas.hasPersona(String(value))) {
      return reply(`Unknown persona "${String(value)}". Use /personas to see the options.`);
    }

    await this.deps.settingsStore.set(
      { scope: 'guild', botId: request.identity.botId, scopeId: request.guildId },
      key,
      String(value)
    );
    return reply(`Server default for \`${key}\` set to **${String(value)}**.`);
  }

  private async setAdminRole(request: InteractionRequest): Promise<ReplyContent> {
    if (!request.isServerAdmin) {
      return reply(SERVER_ADMIN_ONLY_NOTICE);
    }
    if (!request.guildId) {
      return reply('The bot admin role can only be set inside a server.');
    }

    const role = (request.fields.role ?? '').trim();
    if (!/^\d+$/.test(role)) {
      return reply('Pick the role that should manage bot settings.');
    }

    await this.deps.settingsStore.set(this.guildRef(request, request.guildId), ADMIN_ROLE_SETTING, role);
    return reply(`Members with <@&${role}> can now manage bot settings.`);
  }

  private async remind(request: InteractionRequest): Promise<ReplyContent> {
    const delayMs = parseReminderDelay(request.fields.time ?? '');
    if (delayMs === undefined) {
      return reply(INVALID_REMINDER_TIME_NOTICE);
    }
    const message = (request.fields.message ?? '').trim();
    if (!message) {
      return reply('Tell me what to remind you about.');
    }
    if (message.length > MAX_REMINDER_LENGTH) {
      return reply(`Reminders can be at most ${MAX_REMINDER_LENGTH} characters.`);
    }

    const { botId, userId, channelId } = request.identity;
    const pending = await this.deps.reminders.listPending(botId, userId);
    if (pending.length >= MAX_PENDING_REMINDERS) {
      return reply(`You already have ${MAX_PENDING_REMINDERS} pending reminders. Cancel one with /reminders first.`);
    }

    const now = this.now();
    const reminder = await this.deps.reminders.create({
      botId,
      userId,
      channelId,
      guildId: request.guildId,
      message,
      dueAt: now + delayMs,
      createdAt: now
    });
    routerLogger.info(`Reminder #${reminder.id} scheduled in ${delayMs}ms`);
    return reply(`Reminder #${reminder.id} set for ${relativeTime(reminder.dueAt)}: **${message}**`);
  }

  private async manageReminders(request: InteractionRequest): Promise<ReplyContent> {
    const { botId, userId } = request.identity;
    const action = (request.fields.action ?? 'list').trim().toLowerCase();

    switch (action) {
      case 'list': {
        const pending = await this.deps.reminders.listPending(botId, userId);
        if (pending.length === 0) {
          return reply('You have no pending reminders.');
        }
        const lines = pending.map((reminder) => `#${reminder.id} ${relativeTime(reminder.dueAt)}: ${reminder.message}`);
        return reply(['Your pending reminders:', ...lines].join('\n'));
      }
      case 'cancel': {
        const id = Number(request.fields.id ?? '');
        if (!Number.isInteger(id) || id <= 0) {
          return reply('Give the id of the reminder to cancel, e.g. `/reminders action:cancel id:3`.');
        }
        const cancelled = await this.deps.reminders.cancel(botId, userId, id);
        return reply(cancelled ? `Reminder #${id} cancelled.` : `You have no pending reminder #${id}.`);
      }
      default:
        return reply(`Unknown reminders action "${action}". Use list or cancel.`);
    }
  }
}
