/**
 * @parley-module: ReplyComponents
 * @parley-risk: low
 * @parley-scope: utility
 *
 * @description: Builds discord.js button rows and modals from transport-neutral reply specs.
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle
} from 'discord.js';
import type { ModalSpec, ReplyButton } from '../orchestrator/types.js';

const BUTTONS_PER_ROW = 5;
const MAX_ROWS = 5;

export function buildButtonRows(buttons: readonly ReplyButton[] = []): ActionRowBuilder<ButtonBuilder>[] {
  const rows: ActionRowBuilder<ButtonBuilder>[] = [];
  for (let i = 0; i < buttons.length && rows.length < MAX_ROWS; i += BUTTONS_PER_ROW) {
    rows.push(
      new ActionRowBuilder<ButtonBuilder>().addComponents(
        buttons.slice(i, i + BUTTONS_PER_ROW).map((button) =>
          new ButtonBuilder().setCustomId(button.customId).setLabel(button.label).setStyle(ButtonStyle.Secondary)
        )
      )
    );
  }
  return rows;
}

export function buildModal(spec: ModalSpec): ModalBuilder {
  return new ModalBuilder()
    .setCustomId(spec.customId)
    .setTitle(spec.title)
    .addComponents(
      spec.fields.map((field) => {
        const input = new TextInputBuilder()
          .setCustomId(field.customId)
          .setLabel(field.label)
          .setStyle(field.style === 'paragraph' ? TextInputStyle.Paragraph : TextInputStyle.Short)
          .setRequired(field.required ?? false);
        if (field.maxLength !== undefined) {
          input.setMaxLength(field.maxLength);
        }
        return new ActionRowBuilder<TextInputBuilder>().addComponents(input);
      })
    );
}
