/**
 * @parley-module: CommandHandler
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description: Registers the bot's slash commands and context menu entries with Discord.
 *
 * @impact
 * Risk: Registration failures leave users without commands; the bot still answers mentions and DMs.
 */

import { REST, Routes } from 'discord.js';
import type { CommandData } from '../commands/definitions.js';
import { logger } from './logger.js';

/**
 * Minimal REST surface used for registration.
 */
export interface CommandRegistrar {
  put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

export class CommandHandler {
  private readonly rest: CommandRegistrar;

  constructor(token: string, rest?: CommandRegistrar) {
    this.rest = rest ?? new REST({ version: '10' }).setToken(token);
  }

  /**
   * Replaces the registered commands. A guild ID scopes registration to that
   * guild, where updates apply immediately.
   */
  async deployCommands(commands: readonly CommandData[], clientId: string, guildId?: string): Promise<void> {
    const route = guildId ? Routes.applicationGuildCommands(clientId, guildId) : Routes.applicationCommands(clientId);
    const scope = guildId ? 'guild' : 'global';

    logger.debug(`Starting to refresh ${commands.length} ${scope} commands...`);
    for (const command of commands) {
      logger.debug(`Registering command: ${command.name}`);
    }

    try {
      const data = await this.rest.put(route, { body: commands });
      const count = Array.isArray(data) ? data.length : commands.length;
      logger.info(`Successfully reloaded ${count} ${scope} commands.`);
    } catch (error) {
      logger.error(`Failed to register commands: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
