/**
 * @parley-module: InteractionCreate
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description
 * Handles the 'interactionCreate' event: maps slash commands, context menus,
 * buttons and modal submissions to requests and hands them to the orchestrator
 * together with a transport bound to the interaction.
 */

import type { Interaction, ModalBuilder } from 'discord.js';
import { Event } from './Event.js';
import {
  fromButton,
  fromChatInput,
  fromMessageContextMenu,
  fromModalSubmit,
  fromUserContextMenu
} from '../adapters/requestMapper.js';
import { InteractionReplyTransport } from '../transport/InteractionReplyTransport.js';
import type { ModalOpener } from '../transport/InteractionReplyTransport.js';
import type { InteractionOrchestrator } from '../orchestrator/InteractionOrchestrator.js';
import type { InteractionRequest } from '../orchestrator/types.js';
import { createModuleLogger } from '../utils/logger.js';

const interactionLogger = createModuleLogger('interactionCreate');

interface Dependencies {
  botId: string;
  orchestrator: InteractionOrchestrator;
}

const modalOpener =
  (target: { showModal(modal: ModalBuilder): Promise<unknown> }): ModalOpener =>
  (modal) =>
    target.showModal(modal);

export class InteractionCreate extends Event<'interactionCreate'> {
  constructor(private readonly deps: Dependencies) {
    super({ name: 'interactionCreate' });
  }

  public execute(interaction: Interaction): void {
    const { botId, orchestrator } = this.deps;
    let request: InteractionRequest;
    let transport: InteractionReplyTransport;

    // Modal submissions cannot answer with another modal, so they get no opener.
    if (interaction.isChatInputCommand()) {
      request = fromChatInput(interaction, botId);
      transport = new InteractionReplyTransport(interaction, modalOpener(interaction));
    } else if (interaction.isMessageContextMenuCommand()) {
      request = fromMessageContextMenu(interaction, botId);
      transport = new InteractionReplyTransport(interaction, modalOpener(interaction));
    } else if (interaction.isUserContextMenuCommand()) {
      request = fromUserContextMenu(interaction, botId);
      transport = new InteractionReplyTransport(interaction, modalOpener(interaction));
    } else if (interaction.isButton()) {
      request = fromButton(interaction, botId);
      transport = new InteractionReplyTransport(interaction, modalOpener(interaction));
    } else if (interaction.isModalSubmit()) {
      request = fromModalSubmit(interaction, botId);
      transport = new InteractionReplyTransport(interaction);
    } else {
      interactionLogger.debug(`Ignoring unsupported interaction type ${interaction.type}`);
      return;
    }

    interactionLogger.debug(`Dispatching ${request.kind} "${request.name}" (${request.id})`);
    orchestrator.onEvent(request, transport);
  }
}
