/**
 * @parley-module: CommandDefinitions
 * @parley-risk: moderate
 * @parley-scope: interface
 *
 * @description
 * Slash and context-menu command definitions plus the custom ids of the
 * buttons and modals the bot renders. The router and the deploy step both
 * read from here so names cannot drift.
 */

import {
  ApplicationCommandType,
  ChannelType,
  ContextMenuCommandBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder
} from 'discord.js';
import type { RESTPostAPIApplicationCommandsJSONBody } from 'discord.js';
import type { PersonaDefinition, PromptModifier } from '@parley/shared';
import { SETTING_KEYS } from '../utils/SettingsResolver.js';

/** Prompt commands and the modifier each one applies. `hey` is unmodified. */
export const PROMPT_COMMANDS: Readonly<Record<string, PromptModifier | undefined>> = {
  hey: undefined,
  explain: 'explain',
  simple: 'simple',
  steps: 'steps',
  recipe: 'recipe'
};

const PROMPT_COMMAND_DESCRIPTIONS: Readonly<Record<string, string>> = {
  hey: 'Talk to the bot',
  explain: 'Get a clear explanation of something',
  simple: 'Get a simple, beginner-friendly explanation',
  steps: 'Get step-by-step instructions',
  recipe: 'Get a recipe for a dish or ingredients'
};

export const CONTEXT_MENU_COMMANDS = {
  analyzeMessage: 'Analyze Message',
  explainMessage: 'Explain Message',
  analyzeUser: 'Analyze User'
} as const;

export const PERSONA_BUTTON_PREFIX = 'persona_';
export const OPEN_PROMPT_MODAL_BUTTON = 'open_prompt_modal';
export const OPEN_FEEDBACK_MODAL_BUTTON = 'open_feedback_modal';

export const PROMPT_MODAL_ID = 'ai_prompt_modal';
export const PROMPT_MODAL_INPUT = 'prompt';
export const FEEDBACK_MODAL_ID = 'help_feedback_modal';
export const FEEDBACK_MODAL_INPUT = 'feedback';

export type CommandData = RESTPostAPIApplicationCommandsJSONBody;

const buildPromptCommand = (name: string, description: string) =>
  new SlashCommandBuilder()
    .setName(name)
    .setDescription(description)
    .addStringOption((option) =>
      option.setName('prompt').setDescription('What do you want to ask?').setRequired(true).setMaxLength(4000)
    );

/**
 * Every command the bot registers. Persona choices are fixed at deploy time.
 */
export function buildCommandDefinitions(personas: readonly PersonaDefinition[]): CommandData[] {
  const promptCommands = Object.keys(PROMPT_COMMANDS).map((name) =>
    buildPromptCommand(name, PROMPT_COMMAND_DESCRIPTIONS[name] ?? name).toJSON()
  );

  const personaChoices = personas.slice(0, 25).map((persona) => ({ name: persona.name, value: persona.key }));

  const slashCommands = [
    new SlashCommandBuilder().setName('ping').setDescription('Check that the bot is responding'),
    new SlashCommandBuilder().setName('help').setDescription('Show what the bot can do'),
    new SlashCommandBuilder().setName('personas').setDescription('List the available personas'),
    new SlashCommandBuilder()
      .setName('set_persona')
      .setDescription('Choose the persona the bot uses when replying to you')
      .addStringOption((option) =>
        option.setName('persona').setDescription('Persona to use').setRequired(true).addChoices(...personaChoices)
      ),
    new SlashCommandBuilder().setName('forget').setDescription('Forget our conversation in this channel'),
    new SlashCommandBuilder()
      .setName('remind')
      .setDescription('Set a reminder; your persona will remind you later')
      .addStringOption((option) =>
        option.setName('time').setDescription('When to remind you (e.g. 30m, 2h, 1d, 1h30m)').setRequired(true).setMaxLength(32)
      )
      .addStringOption((option) =>
        option.setName('message').setDescription('What to remind you about').setRequired(true).setMaxLength(500)
      ),
    new SlashCommandBuilder()
      .setName('reminders')
      .setDescription('View or cancel your reminders')
      .addStringOption((option) =>
        option
          .setName('action')
          .setDescription('What to do with your reminders')
          .addChoices({ name: 'list', value: 'list' }, { name: 'cancel', value: 'cancel' })
      )
      .addIntegerOption((option) =>
        option.setName('id').setDescription('Reminder id to cancel (with the cancel action)').setMinValue(1)
      ),
    new SlashCommandBuilder()
      .setName('settings')
      .setDescription('Show the effective settings for this channel')
      .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
    new SlashCommandBuilder()
      .setName('set_channel_verbosity')
      .setDescription('Set how detailed replies are in this channel')
      .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
      .addStringOption((option) =>
        option
          .setName('level')
          .setDescription('Reply length')
          .setRequired(true)
          .addChoices(
            { name: 'Concise', value: 'concise' },
            { name: 'Normal', value: 'normal' },
            { name: 'Detailed', value: 'detailed' }
          )
      )
      .addChannelOption((option) =>
        option
          .setName('channel')
          .setDescription('Target channel (defaults to this one)')
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement, ChannelType.GuildForum)
      ),
    new SlashCommandBuilder()
      .setName('set_guild_setting')
      .setDescription('Set a server-wide default')
      .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
      .addStringOption((option) =>
        option
          .setName('key')
          .setDescription('Setting to change')
          .setRequired(true)
          .addChoices(...SETTING_KEYS.map((key) => ({ name: key, value: key })))
      )
      .addStringOption((option) => option.setName('value').setDescription('New value').setRequired(true)),
    new SlashCommandBuilder()
      .setName('admin_role')
      .setDescription('Choose which role can manage bot settings')
      .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
      .addRoleOption((option) =>
        option.setName('role').setDescription('Role allowed to manage bot settings').setRequired(true)
      )
  ].map((command) => command.toJSON());

  const contextMenus = [
    new ContextMenuCommandBuilder().setName(CONTEXT_MENU_COMMANDS.analyzeMessage).setType(ApplicationCommandType.Message),
    new ContextMenuCommandBuilder().setName(CONTEXT_MENU_COMMANDS.explainMessage).setType(ApplicationCommandType.Message),
    new ContextMenuCommandBuilder().setName(CONTEXT_MENU_COMMANDS.analyzeUser).setType(ApplicationCommandType.User)
  ].map((command) => command.toJSON());

  return [...promptCommands, ...slashCommands, ...contextMenus];
}
