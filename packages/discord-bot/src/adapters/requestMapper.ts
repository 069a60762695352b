/**
 * @parley-module: RequestMapper
 * @parley-risk: moderate
 * @parley-scope: integration
 *
 * @description
 * Converts discord.js messages and interactions into frozen InteractionRequest
 * values. Nothing downstream of this module touches discord.js objects.
 */

import { PermissionFlagsBits } from 'discord.js';
import type {
  ButtonInteraction,
  ChatInputCommandInteraction,
  CommandInteractionOption,
  Message,
  MessageContextMenuCommandInteraction,
  ModalSubmitInteraction,
  PermissionsBitField,
  UserContextMenuCommandInteraction
} from 'discord.js';
import type { InteractionKind, InteractionRequest } from '../orchestrator/types.js';

interface RequestParts {
  id: string;
  kind: InteractionKind;
  botId: string;
  userId: string;
  channelId: string | null;
  guildId: string | null;
  name: string;
  text: string;
  fields?: Record<string, string>;
  permissions: Readonly<PermissionsBitField> | null | undefined;
  member: MemberRoles | null | undefined;
  receivedAt: number;
}

/**
 * Role holder shape shared by cached guild members and raw interaction members.
 */
export interface MemberRoles {
  roles: readonly string[] | { cache: { keys(): Iterable<string> } };
}

/**
 * Removes direct mentions of the bot and collapses the leftover whitespace.
 */
export function stripBotMention(content: string, botUserId: string): string {
  return content
    .replace(new RegExp(`<@!?${botUserId}>`, 'g'), ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Flattens slash command options (including subcommand options) to strings.
 */
export function optionsToFields(options: readonly CommandInteractionOption[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const option of options) {
    if (option.options && option.options.length > 0) {
      Object.assign(fields, optionsToFields(option.options));
    }
    if (option.value !== undefined && option.value !== null) {
      fields[option.name] = String(option.value);
    }
  }
  return fields;
}

export function memberRoleIds(member: MemberRoles | null | undefined): string[] {
  if (!member) {
    return [];
  }
  const { roles } = member;
  return 'cache' in roles ? [...roles.cache.keys()] : [...roles];
}

function build(parts: RequestParts): InteractionRequest {
  // DMs have no channel on some interaction types; fall back to the user so history stays per-user.
  const channelId = parts.channelId ?? `dm:${parts.userId}`;
  return Object.freeze({
    id: parts.id,
    kind: parts.kind,
    identity: Object.freeze({ botId: parts.botId, userId: parts.userId, channelId }),
    guildId: parts.guildId,
    name: parts.name,
    text: parts.text,
    fields: Object.freeze({ ...(parts.fields ?? {}) }),
    isAdmin: parts.permissions?.has(PermissionFlagsBits.ManageGuild) ?? false,
    isServerAdmin: parts.permissions?.has(PermissionFlagsBits.Administrator) ?? false,
    roleIds: Object.freeze(memberRoleIds(parts.member)),
    receivedAt: parts.receivedAt
  });
}

export function fromMessage(message: Message, botId: string, botUserId: string): InteractionRequest {
  return build({
    id: message.id,
    kind: 'message',
    botId,
    userId: message.author.id,
    channelId: message.channelId,
    guildId: message.guildId,
    name: message.guildId ? 'mention' : 'dm',
    text: stripBotMention(message.content, botUserId),
    permissions: message.member?.permissions,
    member: message.member,
    receivedAt: message.createdTimestamp
  });
}

export function fromChatInput(interaction: ChatInputCommandInteraction, botId: string): InteractionRequest {
  const fields = optionsToFields(interaction.options.data);
  return build({
    id: interaction.id,
    kind: 'command',
    botId,
    userId: interaction.user.id,
    channelId: interaction.channelId,
    guildId: interaction.guildId,
    name: interaction.commandName,
    text: fields.prompt ?? '',
    fields,
    permissions: interaction.memberPermissions,
    member: interaction.member,
    receivedAt: interaction.createdTimestamp
  });
}

export function fromButton(interaction: ButtonInteraction, botId: string): InteractionRequest {
  return build({
    id: interaction.id,
    kind: 'button',
    botId,
    userId: interaction.user.id,
    channelId: interaction.channelId,
    guildId: interaction.guildId,
    name: interaction.customId,
    text: '',
    permissions: interaction.memberPermissions,
    member: interaction.member,
    receivedAt: interaction.createdTimestamp
  });
}

export function fromModalSubmit(interaction: ModalSubmitInteraction, botId: string): InteractionRequest {
  const fields: Record<string, string> = {};
  for (const [customId, field] of interaction.fields.fields) {
    if ('value' in field && typeof field.value === 'string') {
      fields[customId] = field.value;
    }
  }
  return build({
    id: interaction.id,
    kind: 'modal',
    botId,
    userId: interaction.user.id,
    channelId: interaction.channelId,
    guildId: interaction.guildId,
    name: interaction.customId,
    text: Object.values(fields).join('\n'),
    fields,
    permissions: interaction.memberPermissions,
    member: interaction.member,
    receivedAt: interaction.createdTimestamp
  });
}

export function fromMessageContextMenu(interaction: MessageContextMenuCommandInteraction, botId: string): InteractionRequest {
  const target = interaction.targetMessage;
  return build({
    id: interaction.id,
    kind: 'context-menu',
    botId,
    userId: interaction.user.id,
    channelId: interaction.channelId,
    guildId: interaction.guildId,
    name: interaction.commandName,
    text: target.content,
    fields: { targetMessageId: target.id, targetAuthor: target.author.username },
    permissions: interaction.memberPermissions,
    member: interaction.member,
    receivedAt: interaction.createdTimestamp
  });
}

export function fromUserContextMenu(interaction: UserContextMenuCommandInteraction, botId: string): InteractionRequest {
  const user = interaction.targetUser;
  const summary = [
    `Username: ${user.username}`,
    `Display name: ${user.displayName}`,
    `Bot account: ${user.bot ? 'yes' : 'no'}`,
    `Account created: ${user.createdAt.toISOString()}`
  ].join('\n');

  return build({
    id: interaction.id,
    kind: 'context-menu',
    botId,
    userId: interaction.user.id,
    channelId: interaction.channelId,
    guildId: interaction.guildId,
    name: interaction.commandName,
    text: summary,
    fields: { targetUserId: user.id },
    permissions: interaction.memberPermissions,
    member: interaction.member,
    receivedAt: interaction.createdTimestamp
  });
}
