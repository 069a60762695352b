/**
 * @parley-module: Main
 * @parley-risk: critical
 * @parley-scope: core
 *
 * @description
 * Main orchestration point controlling system initialization, authentication, and event routing.
 *
 * @impact
 * Risk: Failure here can halt the application or expose tokens and credentials.
 */

import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import { PersonaRegistry, createSqliteStores } from '@parley/shared';
import { buildCommandDefinitions } from './commands/definitions.js';
import { InteractionCreate } from './events/InteractionCreate.js';
import { MessageCreate } from './events/MessageCreate.js';
import { InteractionOrchestrator } from './orchestrator/InteractionOrchestrator.js';
import { InteractionRouter } from './orchestrator/InteractionRouter.js';
import { ReminderScheduler } from './reminders/ReminderScheduler.js';
import { ConversationContext } from './state/ConversationContext.js';
import { CommandHandler } from './utils/commandHandler.js';
import { loadConfig, loadDotenv } from './utils/env.js';
import { EventManager } from './utils/eventManager.js';
import { logger } from './utils/logger.js';
import { OpenAIChatBackend } from './utils/openaiService.js';
import { RateLimiter } from './utils/RateLimiter.js';
import { SettingsResolver } from './utils/SettingsResolver.js';

const RATE_LIMIT_CLEANUP_INTERVAL_MS = 5 * 60_000;

loadDotenv();
const config = loadConfig();

// ====================
// Storage and services
// ====================
const stores = createSqliteStores({
  dbPath: config.databasePath,
  pseudonymizationSecret: config.usagePseudonymizationSecret
});
const personas = new PersonaRegistry({ overridePath: config.personaConfigPath });
const settings = new SettingsResolver(stores.settings);
const context = new ConversationContext(stores.conversations);
const rateLimiter = new RateLimiter(config.rateLimit);
const backend = new OpenAIChatBackend({ apiKey: config.openaiApiKey, model: config.openaiModel });

const orchestrator = new InteractionOrchestrator({
  rateLimiter,
  settings,
  preferences: stores.settings,
  context,
  personas,
  planner: new InteractionRouter({
    personas,
    settingsStore: stores.settings,
    settings,
    preferences: stores.settings,
    context,
    reminders: stores.reminders
  }),
  backend,
  usage: stores.usage,
  options: config.interactions
});

// ====================
// Client Configuration
// ====================
const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages
  ],
  // DM channels arrive uncached
  partials: [Partials.Channel],
  presence: { status: 'online' }
});

// Stored state is keyed by BOT_ID so several deployments can share one database.
const botId = config.botId ?? config.clientId;

new EventManager(client)
  .add(new InteractionCreate({ botId, orchestrator }))
  .add(new MessageCreate({ botId, orchestrator, settings }))
  .registerAll();

const reminderScheduler = new ReminderScheduler({
  botId,
  reminders: stores.reminders,
  preferences: stores.settings,
  settings,
  personas,
  backend,
  sender: {
    send: async (channelId, content, userId) => {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !channel.isSendable()) {
        throw new Error(`Channel ${channelId} does not accept messages`);
      }
      await channel.send({ content, allowedMentions: { users: [userId] } });
    }
  },
  options: { pollIntervalMs: config.reminders.pollIntervalMs }
});

client.once(Events.ClientReady, (readyClient) => {
  logger.info(`Logged in as ${readyClient.user.tag}`);
  reminderScheduler.start();
});

const cleanupTimer = setInterval(() => {
  const removed = rateLimiter.cleanup();
  if (removed > 0) {
    logger.debug(`Rate limiter dropped ${removed} idle identities`);
  }
}, RATE_LIMIT_CLEANUP_INTERVAL_MS);
cleanupTimer.unref();

async function main(): Promise<void> {
  logger.debug('Deploying commands to Discord...');
  await new CommandHandler(config.token).deployCommands(
    buildCommandDefinitions(personas.listPersonas()),
    config.clientId,
    config.guildId
  );

  logger.debug('Logging in to Discord...');
  await client.login(config.token);
  logger.info('Bot is now connected to Discord and ready!');
}

let shuttingDown = false;

/**
 * Stops accepting events, lets in-flight interactions finish, then closes storage.
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}; waiting for ${orchestrator.inFlightCount} in-flight interaction(s)`);

  clearInterval(cleanupTimer);
  client.removeAllListeners('interactionCreate');
  client.removeAllListeners('messageCreate');
  await reminderScheduler.stop();
  await orchestrator.idle();
  await client.destroy();
  await stores.close();
  logger.info('Shutdown complete');
}

const exitAfterShutdown = (signal: string): void => {
  shutdown(signal)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
};

process.on('SIGINT', () => exitAfterShutdown('SIGINT'));
process.on('SIGTERM', () => exitAfterShutdown('SIGTERM'));

// ====================
// Handle Uncaught Exceptions
// ====================
process.on('unhandledRejection', (error: unknown) => {
  logger.error(`Unhandled promise rejection: ${error instanceof Error ? error.message : String(error)}`);
});

process.on('uncaughtException', (error: Error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`Failed to initialize bot: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
