/**
 * @parley-module: SqliteUsageStore
 * @parley-risk: low
 * @parley-scope: storage
 *
 * @description
 * Usage-stats sink. `record` never throws and never blocks the caller: the
 * insert runs on a later tick and failures are only logged. User IDs are
 * stored as HMAC digests.
 */
import type Database from 'better-sqlite3';
import { createModuleLogger } from './logger.js';
import { hmacId, pseudonymizeUserId } from './pseudonymization.js';
import { withRetry } from './sqliteUtils.js';
import type { UsageOutcome, UsageRecord, UsageSink } from './contracts.js';

const usageLogger = createModuleLogger('sqliteUsageStore');

interface UsageRow {
  bot_id: string;
  user_hash: string;
  channel_hash: string;
  kind: string;
  outcome: UsageOutcome;
  latency_ms: number;
  persona: string | null;
  created_at: string;
}

export interface UsageSummaryRow {
  kind: string;
  outcome: string;
  count: number;
  avgLatencyMs: number;
}

export interface SqliteUsageStoreConfig {
  pseudonymizationSecret: string;
}

export class SqliteUsageStore implements UsageSink {
  private readonly insertUsage: Database.Statement<[UsageRow]>;
  private readonly summaryStatement: Database.Statement<[{ bot_id: string }], UsageSummaryRow>;
  private readonly pseudonymizationSecret: string;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(private readonly db: Database.Database, config: SqliteUsageStoreConfig) {
    if (!config.pseudonymizationSecret || config.pseudonymizationSecret.trim().length === 0) {
      throw new Error('pseudonymizationSecret is required to initialize SqliteUsageStore.');
    }
    this.pseudonymizationSecret = config.pseudonymizationSecret.trim();

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS usage_stats (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        bot_id TEXT NOT NULL,
        user_hash TEXT NOT NULL,
        channel_hash TEXT NOT NULL,
        kind TEXT NOT NULL,
        outcome TEXT NOT NULL,
        latency_ms INTEGER NOT NULL,
        persona TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_usage_bot_kind ON usage_stats (bot_id, kind);
    `);

    this.insertUsage = this.db.prepare<[UsageRow]>(`
      INSERT INTO usage_stats (bot_id, user_hash, channel_hash, kind, outcome, latency_ms, persona, created_at)
      VALUES (@bot_id, @user_hash, @channel_hash, @kind, @outcome, @latency_ms, @persona, @created_at)
    `);

    this.summaryStatement = this.db.prepare<[{ bot_id: string }], UsageSummaryRow>(`
      SELECT kind, outcome, COUNT(*) AS count, AVG(latency_ms) AS avgLatencyMs
      FROM usage_stats
      WHERE bot_id = @bot_id
      GROUP BY kind, outcome
      ORDER BY kind, outcome
    `);
  }

  record(entry: UsageRecord): void {
    const write = this.write(entry)
      .catch((error: unknown) => {
        usageLogger.warn(`Failed to record usage for ${entry.kind}: ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }

  /**
   * Resolves once every queued write has settled.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  async summarize(botId: string): Promise<UsageSummaryRow[]> {
    return withRetry(() => this.summaryStatement.all({ bot_id: botId }));
  }

  private async write(entry: UsageRecord): Promise<void> {
    // Yield first so the caller's reply path never waits on SQLite.
    await new Promise<void>((resolve) => setImmediate(resolve));

    const userHash = pseudonymizeUserId(entry.identity.userId, this.pseudonymizationSecret) ?? 'unknown';
    await withRetry(() =>
      this.insertUsage.run({
        bot_id: entry.identity.botId,
        user_hash: userHash,
        channel_hash: hmacId(this.pseudonymizationSecret, entry.identity.channelId, 'channel'),
        kind: entry.kind,
        outcome: entry.outcome,
        latency_ms: Math.max(0, Math.round(entry.latencyMs)),
        persona: entry.persona ?? null,
        created_at: new Date().toISOString()
      })
    );
  }
}
