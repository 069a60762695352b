/**
 * @parley-module: SqliteStoreFactory
 * @parley-risk: high
 * @parley-scope: storage
 *
 * @description: Opens the bot database once and builds every SQLite-backed store on the shared handle.
 */
import type Database from 'better-sqlite3';
import { createModuleLogger } from './logger.js';
import { SqliteConversationStore } from './sqliteConversationStore.js';
import { SqliteReminderStore } from './sqliteReminderStore.js';
import { SqliteSettingsStore } from './sqliteSettingsStore.js';
import { SqliteUsageStore } from './sqliteUsageStore.js';
import { openSqliteDatabase } from './sqliteUtils.js';

const storeLogger = createModuleLogger('sqliteStores');

export interface SqliteStoresConfig {
  dbPath: string;
  pseudonymizationSecret: string;
}

export interface SqliteStores {
  db: Database.Database;
  settings: SqliteSettingsStore;
  conversations: SqliteConversationStore;
  reminders: SqliteReminderStore;
  usage: SqliteUsageStore;
  close(): Promise<void>;
}

export function createSqliteStores(config: SqliteStoresConfig): SqliteStores {
  const db = openSqliteDatabase(config.dbPath);
  const usage = new SqliteUsageStore(db, { pseudonymizationSecret: config.pseudonymizationSecret });

  storeLogger.info(`Initialized SQLite stores at ${config.dbPath}`);

  return {
    db,
    settings: new SqliteSettingsStore(db),
    conversations: new SqliteConversationStore(db),
    reminders: new SqliteReminderStore(db),
    usage,
    close: async () => {
      // Pending stats writes must land before the handle goes away.
      await usage.flush();
      db.close();
    }
  };
}
