/**
 * @parley-module: InteractionReplyTransport
 * @parley-risk: high
 * @parley-scope: integration
 *
 * @description
 * ReplyTransport over a discord.js interaction: deferReply/reply for the
 * acknowledgment, editReply for the placeholder, followUp for the rest.
 */

import type { InteractionEditReplyOptions, InteractionReplyOptions, ModalBuilder } from 'discord.js';
import { TransportError } from '../orchestrator/errors.js';
import type { AckHandle, AcknowledgeOptions, ReplyContent, ReplyTransport } from '../orchestrator/types.js';
import { buildButtonRows, buildModal } from './components.js';

/**
 * The slice of a discord.js repliable interaction this transport uses.
 */
export interface InteractionResponder {
  readonly id: string;
  deferReply(options: { ephemeral?: boolean }): Promise<unknown>;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
}

/** Present only for interactions that may answer with a modal. */
export type ModalOpener = (modal: ModalBuilder) => Promise<unknown>;

const NO_MENTIONS = { parse: [] };

export class InteractionReplyTransport implements ReplyTransport {
  private ephemeral = false;

  constructor(
    private readonly interaction: InteractionResponder,
    private readonly openModal?: ModalOpener
  ) {}

  public async acknowledge(options: AcknowledgeOptions): Promise<AckHandle> {
    this.ephemeral = options.ephemeral ?? false;
    const { interaction } = this;

    try {
      if (options.mode === 'deferred') {
        await interaction.deferReply({ ephemeral: this.ephemeral });
        return { id: interaction.id, mode: 'deferred' };
      }

      const { reply } = options;
      if (reply.modal && this.openModal) {
        await this.openModal(buildModal(reply.modal));
      } else {
        await interaction.reply({
          content: reply.content,
          components: buildButtonRows(reply.buttons),
          ephemeral: this.ephemeral,
          allowedMentions: NO_MENTIONS
        });
      }
      return { id: interaction.id, mode: 'immediate' };
    } catch (error) {
      throw new TransportError('acknowledge', error);
    }
  }

  public async editAcknowledgment(_handle: AckHandle, reply: ReplyContent): Promise<void> {
    try {
      await this.interaction.editReply({
        content: reply.content,
        components: buildButtonRows(reply.buttons),
        allowedMentions: NO_MENTIONS
      });
    } catch (error) {
      throw new TransportError('edit', error);
    }
  }

  public async sendFollowup(content: string): Promise<void> {
    try {
      await this.interaction.followUp({ content, ephemeral: this.ephemeral, allowedMentions: NO_MENTIONS });
    } catch (error) {
      throw new TransportError('followup', error);
    }
  }
}
