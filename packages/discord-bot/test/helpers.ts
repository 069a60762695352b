/**
 * @description: In-process fakes shared by the bot tests.
 * @parley-scope: test
 * @parley-module: TestHelpers
 * @parley-risk: low - Test-only doubles.
 */

import type {
  ConversationStore,
  ConversationTurn,
  Identity,
  NewReminder,
  PersonaPreferenceStore,
  Reminder,
  ReminderStore,
  SettingScopeRef,
  SettingsStore,
  UsageRecord,
  UsageSink
} from '@parley/shared';
import { TransportError, type TransportOperation } from '../src/orchestrator/errors.js';
import type {
  AckHandle,
  AcknowledgeOptions,
  InteractionRequest,
  ReplyContent,
  ReplyTransport
} from '../src/orchestrator/types.js';

export type TransportCall =
  | { op: 'acknowledge'; options: AcknowledgeOptions }
  | { op: 'edit'; reply: ReplyContent }
  | { op: 'followup'; content: string };

/**
 * Records every call. `failNext` queues failures per operation; each queued
 * failure throws a TransportError once.
 */
export class RecordingTransport implements ReplyTransport {
  public readonly calls: TransportCall[] = [];
  private readonly pendingFailures: Record<TransportOperation, number> = { acknowledge: 0, edit: 0, followup: 0 };

  failNext(operation: TransportOperation, times = 1): void {
    this.pendingFailures[operation] += times;
  }

  async acknowledge(options: AcknowledgeOptions): Promise<AckHandle> {
    this.calls.push({ op: 'acknowledge', options });
    this.maybeFail('acknowledge');
    return { id: 'ack-1', mode: options.mode };
  }

  async editAcknowledgment(_handle: AckHandle, reply: ReplyContent): Promise<void> {
    this.calls.push({ op: 'edit', reply });
    this.maybeFail('edit');
  }

  async sendFollowup(content: string): Promise<void> {
    this.calls.push({ op: 'followup', content });
    this.maybeFail('followup');
  }

  /** Visible text of every send, in order. */
  get sentTexts(): string[] {
    return this.calls.map((call) => {
      switch (call.op) {
        case 'acknowledge':
          return call.options.mode === 'immediate' ? call.options.reply.content : '<deferred>';
        case 'edit':
          return call.reply.content;
        case 'followup':
          return call.content;
      }
    });
  }

  private maybeFail(operation: TransportOperation): void {
    if (this.pendingFailures[operation] > 0) {
      this.pendingFailures[operation] -= 1;
      throw new TransportError(operation, new Error(`simulated ${operation} failure`));
    }
  }
}

const identityKey = (identity: Identity) => `${identity.botId}|${identity.userId}|${identity.channelId}`;

interface StoredTurn {
  id: number;
  exchange: number;
  turn: ConversationTurn;
}

/**
 * Mirrors the SQLite ordering: by exchange (reply target or own id), then id.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly turns = new Map<string, StoredTurn[]>();
  private nextId = 1;
  public failReads = false;

  async append(identity: Identity, turn: ConversationTurn, replyTo?: number): Promise<number> {
    const key = identityKey(identity);
    const id = this.nextId++;
    this.turns.set(key, [...(this.turns.get(key) ?? []), { id, exchange: replyTo ?? id, turn }]);
    return id;
  }

  async read(identity: Identity, limit: number): Promise<ConversationTurn[]> {
    if (this.failReads) {
      throw new Error('conversation store offline');
    }
    if (limit <= 0) return [];
    return [...(this.turns.get(identityKey(identity)) ?? [])]
      .sort((a, b) => a.exchange - b.exchange || a.id - b.id)
      .slice(-limit)
      .map((stored) => stored.turn);
  }

  async clear(identity: Identity): Promise<number> {
    const key = identityKey(identity);
    const removed = this.turns.get(key)?.length ?? 0;
    this.turns.delete(key);
    return removed;
  }
}

const scopeKey = (ref: SettingScopeRef) => `${ref.botId}|${ref.scope}|${ref.scopeId}`;

export class InMemorySettingsStore implements SettingsStore, PersonaPreferenceStore {
  private readonly settings = new Map<string, Map<string, string>>();
  private readonly personas = new Map<string, string>();
  public failReads = false;

  async get(ref: SettingScopeRef, key: string): Promise<string | undefined> {
    if (this.failReads) {
      throw new Error('settings store offline');
    }
    return this.settings.get(scopeKey(ref))?.get(key);
  }

  async set(ref: SettingScopeRef, key: string, value: string): Promise<void> {
    const scoped = this.settings.get(scopeKey(ref)) ?? new Map<string, string>();
    scoped.set(key, value);
    this.settings.set(scopeKey(ref), scoped);
  }

  async list(ref: SettingScopeRef): Promise<Record<string, string>> {
    return Object.fromEntries(this.settings.get(scopeKey(ref)) ?? []);
  }

  async getPersona(botId: string, userId: string): Promise<string | undefined> {
    return this.personas.get(`${botId}|${userId}`);
  }

  async setPersona(botId: string, userId: string, persona: string): Promise<void> {
    this.personas.set(`${botId}|${userId}`, persona);
  }
}

interface StoredReminder {
  reminder: Reminder;
  completedAt?: number;
  cancelled?: boolean;
}

export class InMemoryReminderStore implements ReminderStore {
  private readonly rows: StoredReminder[] = [];

  async create(reminder: NewReminder): Promise<Reminder> {
    const stored = { ...reminder, id: this.rows.length + 1 };
    this.rows.push({ reminder: stored });
    return stored;
  }

  async listPending(botId: string, userId: string): Promise<Reminder[]> {
    return this.pending().filter((reminder) => reminder.botId === botId && reminder.userId === userId);
  }

  async cancel(botId: string, userId: string, id: number): Promise<boolean> {
    const row = this.rows.find(
      (candidate) =>
        candidate.reminder.id === id &&
        candidate.reminder.botId === botId &&
        candidate.reminder.userId === userId &&
        candidate.completedAt === undefined &&
        !candidate.cancelled
    );
    if (!row) return false;
    row.cancelled = true;
    return true;
  }

  async due(botId: string, now: number, limit: number): Promise<Reminder[]> {
    if (limit <= 0) return [];
    return this.pending()
      .filter((reminder) => reminder.botId === botId && reminder.dueAt <= now)
      .slice(0, limit);
  }

  async complete(id: number, completedAt: number): Promise<void> {
    const row = this.rows.find((candidate) => candidate.reminder.id === id);
    if (row && row.completedAt === undefined) {
      row.completedAt = completedAt;
    }
  }

  completedAt(id: number): number | undefined {
    return this.rows.find((candidate) => candidate.reminder.id === id)?.completedAt;
  }

  private pending(): Reminder[] {
    return this.rows
      .filter((row) => row.completedAt === undefined && !row.cancelled)
      .map((row) => row.reminder)
      .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id);
  }
}

export class RecordingUsageSink implements UsageSink {
  public readonly records: UsageRecord[] = [];

  record(entry: UsageRecord): void {
    this.records.push(entry);
  }
}

export function makeRequest(overrides: Partial<InteractionRequest> = {}): InteractionRequest {
  return {
    id: 'interaction-1',
    kind: 'command',
    identity: { botId: 'bot-a', userId: 'user-1', channelId: 'channel-1' },
    guildId: 'guild-1',
    name: 'hey',
    text: 'hello there',
    fields: { prompt: 'hello there' },
    isAdmin: false,
    isServerAdmin: false,
    roleIds: [],
    receivedAt: Date.now(),
    ...overrides
  };
}

/**
 * A promise plus its resolvers, for driving completions by hand.
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
