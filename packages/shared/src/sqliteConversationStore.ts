/**
 * @parley-module: SqliteConversationStore
 * @parley-risk: high
 * @parley-scope: storage
 *
 * @description
 * Persists conversation turns per (bot, user, channel). Rows are append-only.
 * Reads order by exchange (a reply's `reply_to`, otherwise the row id) and then
 * by id, so a reply lands right after its prompt even when another prompt was
 * stored in between.
 *
 * @impact
 * Risk: Ordering mistakes would scramble the history sent to the model.
 */
import type Database from 'better-sqlite3';
import { createModuleLogger } from './logger.js';
import { withRetry } from './sqliteUtils.js';
import type { ConversationRole, ConversationStore, ConversationTurn, Identity } from './contracts.js';

const conversationLogger = createModuleLogger('sqliteConversationStore');

interface TurnRow {
  role: string;
  content: string;
  created_at: number;
}

interface IdentityParams {
  bot_id: string;
  user_id: string;
  channel_id: string;
}

interface InsertTurnParams extends IdentityParams {
  role: ConversationRole;
  content: string;
  created_at: number;
  reply_to: number | null;
}

const isConversationRole = (value: string): value is ConversationRole =>
  value === 'user' || value === 'assistant';

const toIdentityParams = (identity: Identity): IdentityParams => ({
  bot_id: identity.botId,
  user_id: identity.userId,
  channel_id: identity.channelId
});

export class SqliteConversationStore implements ConversationStore {
  private readonly insertTurn: Database.Statement<[InsertTurnParams]>;
  private readonly selectRecent: Database.Statement<[IdentityParams & { limit: number }], TurnRow>;
  private readonly deleteTurns: Database.Statement<[IdentityParams]>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        bot_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        channel_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        reply_to INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_conversation_identity
        ON conversation_turns (bot_id, user_id, channel_id, id);
    `);

    this.insertTurn = this.db.prepare<[InsertTurnParams]>(`
      INSERT INTO conversation_turns (bot_id, user_id, channel_id, role, content, created_at, reply_to)
      VALUES (@bot_id, @user_id, @channel_id, @role, @content, @created_at, @reply_to)
    `);

    // Newest N first, then flipped so callers get chronological order.
    this.selectRecent = this.db.prepare<[IdentityParams & { limit: number }], TurnRow>(`
      SELECT role, content, created_at FROM (
        SELECT id, role, content, created_at, COALESCE(reply_to, id) AS exchange
        FROM conversation_turns
        WHERE bot_id = @bot_id AND user_id = @user_id AND channel_id = @channel_id
        ORDER BY exchange DESC, id DESC
        LIMIT @limit
      )
      ORDER BY exchange ASC, id ASC
    `);

    this.deleteTurns = this.db.prepare<[IdentityParams]>(`
      DELETE FROM conversation_turns
      WHERE bot_id = @bot_id AND user_id = @user_id AND channel_id = @channel_id
    `);
  }

  async append(identity: Identity, turn: ConversationTurn, replyTo?: number): Promise<number> {
    const result = await withRetry(() =>
      this.insertTurn.run({
        ...toIdentityParams(identity),
        role: turn.role,
        content: turn.content,
        created_at: turn.timestamp,
        reply_to: replyTo ?? null
      })
    );
    return Number(result.lastInsertRowid);
  }

  async read(identity: Identity, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }

    const rows = await withRetry(() => this.selectRecent.all({ ...toIdentityParams(identity), limit }));
    const turns: ConversationTurn[] = [];
    for (const row of rows) {
      if (!isConversationRole(row.role)) {
        conversationLogger.warn(`Skipping stored turn with unknown role "${row.role}"`);
        continue;
      }
      turns.push({ role: row.role, content: row.content, timestamp: row.created_at });
    }
    return turns;
  }

  async clear(identity: Identity): Promise<number> {
    const result = await withRetry(() => this.deleteTurns.run(toIdentityParams(identity)));
    conversationLogger.info(`Cleared ${result.changes} conversation turns`);
    return result.changes;
  }
}
