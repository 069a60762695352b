/**
 * @parley-module: MessageReplyTransport
 * @parley-risk: high
 * @parley-scope: integration
 *
 * @description
 * ReplyTransport for plain messages (mentions and DMs). The acknowledgment is a
 * placeholder reply that later gets edited; followups go to the channel.
 * Messages cannot be ephemeral and cannot open modals.
 */

import type { Message, MessageCreateOptions, MessageEditOptions, MessageReplyOptions } from 'discord.js';
import { TransportError } from '../orchestrator/errors.js';
import { PLACEHOLDER_NOTICE } from '../orchestrator/notices.js';
import type { AckHandle, AcknowledgeOptions, ReplyContent, ReplyTransport } from '../orchestrator/types.js';
import { buildButtonRows } from './components.js';

export interface EditableMessage {
  readonly id: string;
  edit(options: MessageEditOptions): Promise<unknown>;
}

/**
 * The slice of a discord.js message this transport uses.
 */
export interface MessageTarget {
  reply(options: MessageReplyOptions): Promise<EditableMessage>;
  send(options: MessageCreateOptions): Promise<unknown>;
}

/**
 * Adapts a discord.js message. Channels that cannot receive messages fail on send.
 */
export function toMessageTarget(message: Message): MessageTarget {
  return {
    reply: (options) => message.reply(options),
    send: async (options) => {
      const { channel } = message;
      if (!channel.isSendable()) {
        throw new Error(`Channel ${channel.id} does not accept messages`);
      }
      return channel.send(options);
    }
  };
}

const NO_MENTIONS = { parse: [], repliedUser: false };

export class MessageReplyTransport implements ReplyTransport {
  private placeholder: EditableMessage | undefined;

  constructor(private readonly target: MessageTarget) {}

  public async acknowledge(options: AcknowledgeOptions): Promise<AckHandle> {
    const content = options.mode === 'deferred' ? PLACEHOLDER_NOTICE : options.reply.content;
    const buttons = options.mode === 'deferred' ? [] : options.reply.buttons;

    try {
      const sent = await this.target.reply({
        content,
        components: buildButtonRows(buttons),
        allowedMentions: NO_MENTIONS
      });
      if (options.mode === 'deferred') {
        this.placeholder = sent;
      }
      return { id: sent.id, mode: options.mode };
    } catch (error) {
      throw new TransportError('acknowledge', error);
    }
  }

  public async editAcknowledgment(_handle: AckHandle, reply: ReplyContent): Promise<void> {
    const placeholder = this.placeholder;
    if (!placeholder) {
      throw new TransportError('edit', new Error('No placeholder message to edit'));
    }
    try {
      await placeholder.edit({
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
      await this.target.send({ content, allowedMentions: NO_MENTIONS });
    } catch (error) {
      throw new TransportError('followup', error);
    }
  }
}
