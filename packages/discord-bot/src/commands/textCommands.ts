/**
 * @description: Parses `!name args` and `/name args` text typed in a DM or after a mention.
 * @parley-scope: utility
 * @parley-module: TextCommands
 * @parley-risk: low - Unrecognised names are reported back to the user, never executed.
 */

import { PROMPT_COMMANDS } from './definitions.js';

export const TEXT_COMMAND_PREFIXES: readonly string[] = ['!', '/'];

export interface TextCommand {
  /** Lowercased name without its prefix. */
  name: string;
  args: string[];
  /** Everything after the name, trimmed. */
  rest: string;
}

/** Commands that can be typed instead of used through the slash menu. */
export const TEXT_COMMAND_NAMES: ReadonlySet<string> = new Set([
  ...Object.keys(PROMPT_COMMANDS),
  'ping',
  'help',
  'personas',
  'set_persona',
  'forget',
  'remind',
  'reminders'
]);

export function parseTextCommand(text: string): TextCommand | undefined {
  const trimmed = text.trim();
  if (!TEXT_COMMAND_PREFIXES.includes(trimmed.charAt(0))) {
    return undefined;
  }

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed.slice(1));
  if (!match) {
    return undefined;
  }

  const rest = match[2].trim();
  return {
    name: match[1].toLowerCase(),
    args: rest ? rest.split(/\s+/) : [],
    rest
  };
}

/**
 * Maps positional arguments onto the option names the slash command uses.
 */
export function textCommandFields(command: TextCommand): Record<string, string> {
  const [first = '', ...others] = command.args;
  switch (command.name) {
    case 'set_persona':
      return { persona: first };
    case 'remind':
      return { time: first, message: others.join(' ') };
    case 'reminders':
      return first ? { action: first, id: others[0] ?? '' } : {};
    default:
      return Object.prototype.hasOwnProperty.call(PROMPT_COMMANDS, command.name) ? { prompt: command.rest } : {};
  }
}
