/**
 * @parley-module: MessageCreate
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description
 * Handles the 'messageCreate' event. Direct messages always qualify; guild
 * messages qualify when they mention the bot and the channel has not turned
 * mention responses off. Messages from bots are ignored.
 *
 * @impact
 * Risk: Over-eager matching makes the bot talk over people; under-matching makes it look dead.
 */

import type { Message } from 'discord.js';
import { Event } from './Event.js';
import { fromMessage } from '../adapters/requestMapper.js';
import { MessageReplyTransport, toMessageTarget } from '../transport/MessageReplyTransport.js';
import type { InteractionOrchestrator } from '../orchestrator/InteractionOrchestrator.js';
import type { SettingsResolver } from '../utils/SettingsResolver.js';
import { createModuleLogger } from '../utils/logger.js';

const messageLogger = createModuleLogger('messageCreate');

interface Dependencies {
  botId: string;
  orchestrator: InteractionOrchestrator;
  settings: SettingsResolver;
}

export class MessageCreate extends Event<'messageCreate'> {
  constructor(private readonly deps: Dependencies) {
    super({ name: 'messageCreate' });
  }

  public async execute(message: Message): Promise<void> {
    if (message.author.bot) {
      return;
    }

    const botUserId = message.client.user.id;
    const { botId, orchestrator, settings } = this.deps;

    if (message.guildId) {
      if (!message.mentions.users.has(botUserId)) {
        return;
      }
      const mentionResponses = await settings.resolveOrDefault('mention_responses', botId, message.channelId, message.guildId);
      if (mentionResponses === 'disabled') {
        messageLogger.debug(`Mention responses disabled in channel ${message.channelId}; ignoring ${message.id}`);
        return;
      }
    }

    const request = fromMessage(message, botId, botUserId);
    orchestrator.onEvent(request, new MessageReplyTransport(toMessageTarget(message)));
  }
}
