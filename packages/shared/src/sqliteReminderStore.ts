/**
 * @parley-module: SqliteReminderStore
 * @parley-risk: moderate
 * @parley-scope: storage
 *
 * @description
 * Reminders set through `/remind`. A reminder stays pending until the scheduler
 * marks it complete or its owner cancels it; neither row is ever read again.
 */
import type Database from 'better-sqlite3';
import { createModuleLogger } from './logger.js';
import { withRetry } from './sqliteUtils.js';
import type { NewReminder, Reminder, ReminderStore } from './contracts.js';

const reminderLogger = createModuleLogger('sqliteReminderStore');

interface ReminderRow {
  id: number;
  bot_id: string;
  user_id: string;
  channel_id: string;
  guild_id: string | null;
  message: string;
  due_at: number;
  created_at: number;
}

type InsertReminderParams = Omit<ReminderRow, 'id'>;

interface OwnerParams {
  bot_id: string;
  user_id: string;
}

const toReminder = (row: ReminderRow): Reminder => ({
  id: row.id,
  botId: row.bot_id,
  userId: row.user_id,
  channelId: row.channel_id,
  guildId: row.guild_id,
  message: row.message,
  dueAt: row.due_at,
  createdAt: row.created_at
});

export class SqliteReminderStore implements ReminderStore {
  private readonly insertReminder: Database.Statement<[InsertReminderParams]>;
  private readonly selectPending: Database.Statement<[OwnerParams], ReminderRow>;
  private readonly cancelReminder: Database.Statement<[OwnerParams & { id: number; cancelled_at: number }]>;
  private readonly selectDue: Database.Statement<[{ bot_id: string; now: number; limit: number }], ReminderRow>;
  private readonly completeReminder: Database.Statement<[{ id: number; completed_at: number }]>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS reminders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        bot_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        channel_id TEXT NOT NULL,
        guild_id TEXT,
        message TEXT NOT NULL,
        due_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        completed_at INTEGER,
        cancelled_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_reminders_pending
        ON reminders (bot_id, due_at) WHERE completed_at IS NULL AND cancelled_at IS NULL;
    `);

    this.insertReminder = this.db.prepare<[InsertReminderParams]>(`
      INSERT INTO reminders (bot_id, user_id, channel_id, guild_id, message, due_at, created_at)
      VALUES (@bot_id, @user_id, @channel_id, @guild_id, @message, @due_at, @created_at)
    `);

    this.selectPending = this.db.prepare<[OwnerParams], ReminderRow>(`
      SELECT id, bot_id, user_id, channel_id, guild_id, message, due_at, created_at
      FROM reminders
      WHERE bot_id = @bot_id AND user_id = @user_id AND completed_at IS NULL AND cancelled_at IS NULL
      ORDER BY due_at ASC, id ASC
    `);

    this.cancelReminder = this.db.prepare<[OwnerParams & { id: number; cancelled_at: number }]>(`
      UPDATE reminders SET cancelled_at = @cancelled_at
      WHERE id = @id AND bot_id = @bot_id AND user_id = @user_id
        AND completed_at IS NULL AND cancelled_at IS NULL
    `);

    this.selectDue = this.db.prepare<[{ bot_id: string; now: number; limit: number }], ReminderRow>(`
      SELECT id, bot_id, user_id, channel_id, guild_id, message, due_at, created_at
      FROM reminders
      WHERE bot_id = @bot_id AND due_at <= @now AND completed_at IS NULL AND cancelled_at IS NULL
      ORDER BY due_at ASC, id ASC
      LIMIT @limit
    `);

    this.completeReminder = this.db.prepare<[{ id: number; completed_at: number }]>(`
      UPDATE reminders SET completed_at = @completed_at WHERE id = @id AND completed_at IS NULL
    `);
  }

  async create(reminder: NewReminder): Promise<Reminder> {
    const result = await withRetry(() =>
      this.insertReminder.run({
        bot_id: reminder.botId,
        user_id: reminder.userId,
        channel_id: reminder.channelId,
        guild_id: reminder.guildId,
        message: reminder.message,
        due_at: reminder.dueAt,
        created_at: reminder.createdAt
      })
    );
    const id = Number(result.lastInsertRowid);
    reminderLogger.debug(`Stored reminder #${id}`);
    return { ...reminder, id };
  }

  async listPending(botId: string, userId: string): Promise<Reminder[]> {
    const rows = await withRetry(() => this.selectPending.all({ bot_id: botId, user_id: userId }));
    return rows.map(toReminder);
  }

  async cancel(botId: string, userId: string, id: number): Promise<boolean> {
    const result = await withRetry(() =>
      this.cancelReminder.run({ bot_id: botId, user_id: userId, id, cancelled_at: Date.now() })
    );
    return result.changes > 0;
  }

  async due(botId: string, now: number, limit: number): Promise<Reminder[]> {
    if (limit <= 0) {
      return [];
    }
    const rows = await withRetry(() => this.selectDue.all({ bot_id: botId, now, limit }));
    return rows.map(toReminder);
  }

  async complete(id: number, completedAt: number): Promise<void> {
    await withRetry(() => this.completeReminder.run({ id, completed_at: completedAt }));
  }
}
