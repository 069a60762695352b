/**
 * @description Public exports for shared logging, storage and persona utilities.
 * @parley-scope interface
 * @parley-module SharedIndex
 * @parley-risk: low - Export changes can break downstream imports.
 */

/**
 * Logging utilities.
 */
export { logger, createModuleLogger, sanitizeLogData } from './logger.js';

/**
 * Storage contracts shared with the bot core.
 */
export type {
  ConversationRole,
  ConversationStore,
  ConversationTurn,
  Identity,
  NewReminder,
  PersonaPreferenceStore,
  Reminder,
  ReminderStore,
  SettingScope,
  SettingScopeRef,
  SettingsStore,
  UsageOutcome,
  UsageRecord,
  UsageSink
} from './contracts.js';

/**
 * SQLite-backed stores.
 */
export { openSqliteDatabase, withRetry, isBusyError } from './sqliteUtils.js';
export { SqliteConversationStore } from './sqliteConversationStore.js';
export { SqliteSettingsStore } from './sqliteSettingsStore.js';
export { SqliteReminderStore } from './sqliteReminderStore.js';
export { SqliteUsageStore } from './sqliteUsageStore.js';
export type { SqliteUsageStoreConfig, UsageSummaryRow } from './sqliteUsageStore.js';
export { createSqliteStores } from './sqliteStores.js';
export type { SqliteStores, SqliteStoresConfig } from './sqliteStores.js';

/**
 * Persona prompts.
 */
export {
  FALLBACK_REMINDER_TEMPLATE,
  FALLBACK_SYSTEM_PROMPT,
  PersonaRegistry,
  isPromptModifier,
  isVerbosity
} from './prompts/personaRegistry.js';
export type {
  PersonaDefinition,
  PersonaRegistryOptions,
  PromptModifier,
  Verbosity
} from './prompts/personaRegistry.js';

/**
 * Pseudonymization helpers for Discord-facing identifiers.
 */
export { hmacId, pseudonymizeUserId, shortHash } from './pseudonymization.js';
