/**
 * @parley-module: SqliteSettingsStore
 * @parley-risk: moderate
 * @parley-scope: storage
 *
 * @description
 * Channel- and guild-scoped setting overrides plus per-user persona preferences.
 * System defaults are not stored here; they live with the resolver.
 */
import type Database from 'better-sqlite3';
import { createModuleLogger } from './logger.js';
import { withRetry } from './sqliteUtils.js';
import type { PersonaPreferenceStore, SettingScopeRef, SettingsStore } from './contracts.js';

const settingsLogger = createModuleLogger('sqliteSettingsStore');

interface ScopeParams {
  bot_id: string;
  scope: string;
  scope_id: string;
}

interface SettingRow {
  setting_key: string;
  setting_value: string;
}

interface PreferenceParams {
  bot_id: string;
  user_id: string;
}

const toScopeParams = (ref: SettingScopeRef): ScopeParams => ({
  bot_id: ref.botId,
  scope: ref.scope,
  scope_id: ref.scopeId
});

export class SqliteSettingsStore implements SettingsStore, PersonaPreferenceStore {
  private readonly selectSetting: Database.Statement<[ScopeParams & { setting_key: string }], SettingRow>;
  private readonly selectScope: Database.Statement<[ScopeParams], SettingRow>;
  private readonly upsertSetting: Database.Statement<[ScopeParams & SettingRow & { updated_at: string }]>;
  private readonly selectPersona: Database.Statement<[PreferenceParams], { persona: string }>;
  private readonly upsertPersona: Database.Statement<[PreferenceParams & { persona: string; updated_at: string }]>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bot_settings (
        bot_id TEXT NOT NULL,
        scope TEXT NOT NULL,
        scope_id TEXT NOT NULL,
        setting_key TEXT NOT NULL,
        setting_value TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (bot_id, scope, scope_id, setting_key)
      );

      CREATE TABLE IF NOT EXISTS user_preferences (
        bot_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        persona TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (bot_id, user_id)
      );
    `);

    this.selectSetting = this.db.prepare<[ScopeParams & { setting_key: string }], SettingRow>(`
      SELECT setting_key, setting_value FROM bot_settings
      WHERE bot_id = @bot_id AND scope = @scope AND scope_id = @scope_id AND setting_key = @setting_key
      LIMIT 1
    `);

    this.selectScope = this.db.prepare<[ScopeParams], SettingRow>(`
      SELECT setting_key, setting_value FROM bot_settings
      WHERE bot_id = @bot_id AND scope = @scope AND scope_id = @scope_id
      ORDER BY setting_key
    `);

    this.upsertSetting = this.db.prepare<[ScopeParams & SettingRow & { updated_at: string }]>(`
      INSERT INTO bot_settings (bot_id, scope, scope_id, setting_key, setting_value, updated_at)
      VALUES (@bot_id, @scope, @scope_id, @setting_key, @setting_value, @updated_at)
      ON CONFLICT (bot_id, scope, scope_id, setting_key)
      DO UPDATE SET setting_value = excluded.setting_value, updated_at = excluded.updated_at
    `);

    this.selectPersona = this.db.prepare<[PreferenceParams], { persona: string }>(`
      SELECT persona FROM user_preferences WHERE bot_id = @bot_id AND user_id = @user_id LIMIT 1
    `);

    this.upsertPersona = this.db.prepare<[PreferenceParams & { persona: string; updated_at: string }]>(`
      INSERT INTO user_preferences (bot_id, user_id, persona, updated_at)
      VALUES (@bot_id, @user_id, @persona, @updated_at)
      ON CONFLICT (bot_id, user_id)
      DO UPDATE SET persona = excluded.persona, updated_at = excluded.updated_at
    `);
  }

  async get(ref: SettingScopeRef, key: string): Promise<string | undefined> {
    const row = await withRetry(() => this.selectSetting.get({ ...toScopeParams(ref), setting_key: key }));
    return row?.setting_value;
  }

  async set(ref: SettingScopeRef, key: string, value: string): Promise<void> {
    await withRetry(() =>
      this.upsertSetting.run({
        ...toScopeParams(ref),
        setting_key: key,
        setting_value: value,
        updated_at: new Date().toISOString()
      })
    );
    settingsLogger.info(`Setting "${key}" updated at ${ref.scope} scope`);
  }

  async list(ref: SettingScopeRef): Promise<Record<string, string>> {
    const rows = await withRetry(() => this.selectScope.all(toScopeParams(ref)));
    const settings: Record<string, string> = {};
    for (const row of rows) {
      settings[row.setting_key] = row.setting_value;
    }
    return settings;
  }

  async getPersona(botId: string, userId: string): Promise<string | undefined> {
    const row = await withRetry(() => this.selectPersona.get({ bot_id: botId, user_id: userId }));
    return row?.persona;
  }

  async setPersona(botId: string, userId: string, persona: string): Promise<void> {
    await withRetry(() =>
      this.upsertPersona.run({
        bot_id: botId,
        user_id: userId,
        persona,
        updated_at: new Date().toISOString()
      })
    );
  }
}
