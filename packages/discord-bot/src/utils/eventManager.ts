/**
 * @parley-module: EventManager
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description: Binds the bot's event handlers to the Discord client.
 */

import type { Client, ClientEvents } from 'discord.js';
import { logger } from './logger.js';
import type { Event } from '../events/Event.js';

/**
 * Structural view of an event handler; erases the event-name parameter so handlers for different events share a list.
 */
interface RegistrableEvent {
  readonly name: keyof ClientEvents;
  register(client: Client): void;
}

export class EventManager {
  private readonly events: RegistrableEvent[] = [];

  constructor(private readonly client: Client) {}

  add<K extends keyof ClientEvents>(event: Event<K>): this {
    this.events.push(event);
    return this;
  }

  registerAll(): void {
    for (const event of this.events) {
      event.register(this.client);
    }
    logger.info(`Registered ${this.events.length} event handlers.`);
  }
}
