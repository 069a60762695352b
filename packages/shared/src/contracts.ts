/**
 * @parley-module: StorageContracts
 * @parley-risk: moderate
 * @parley-scope: interface
 *
 * @description
 * Boundary shapes shared between the bot core and the storage backends. Every
 * stateful key carries the bot identity so independently configured bots
 * sharing one database never read each other's rows.
 */

/**
 * Isolation key for per-conversation state.
 */
export interface Identity {
  botId: string;
  userId: string;
  channelId: string;
}

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

/**
 * Append-only turn storage. `append` resolves with the stored turn's id. A turn
 * appended with `replyTo` sorts directly after that turn, whatever was written
 * in between. `read` returns the most recent `limit` turns in that order, oldest first.
 */
export interface ConversationStore {
  append(identity: Identity, turn: ConversationTurn, replyTo?: number): Promise<number>;
  read(identity: Identity, limit: number): Promise<ConversationTurn[]>;
  clear(identity: Identity): Promise<number>;
}

/** Scopes that can hold an override; the system default lives in code. */
export type SettingScope = 'channel' | 'guild';

export interface SettingScopeRef {
  scope: SettingScope;
  botId: string;
  /** Channel or guild identifier, depending on `scope`. */
  scopeId: string;
}

export interface SettingsStore {
  get(ref: SettingScopeRef, key: string): Promise<string | undefined>;
  set(ref: SettingScopeRef, key: string, value: string): Promise<void>;
  list(ref: SettingScopeRef): Promise<Record<string, string>>;
}

/**
 * Per-user persona choice made through `/set_persona` or a persona button.
 */
export interface PersonaPreferenceStore {
  getPersona(botId: string, userId: string): Promise<string | undefined>;
  setPersona(botId: string, userId: string, persona: string): Promise<void>;
}

export type UsageOutcome = 'delivered' | 'rate_limited' | 'failed' | 'expired';

export interface UsageRecord {
  identity: Identity;
  /** Interaction kind plus name, e.g. `command:hey`. */
  kind: string;
  outcome: UsageOutcome;
  latencyMs: number;
  persona?: string;
}

/**
 * Fire-and-forget stats sink. Implementations must not throw into callers.
 */
export interface UsageSink {
  record(entry: UsageRecord): void;
}

export interface NewReminder {
  botId: string;
  userId: string;
  channelId: string;
  guildId: string | null;
  message: string;
  /** Epoch milliseconds. */
  dueAt: number;
  createdAt: number;
}

export interface Reminder extends NewReminder {
  id: number;
}

/**
 * Pending reminders per bot. Delivered and cancelled reminders drop out of every read.
 */
export interface ReminderStore {
  create(reminder: NewReminder): Promise<Reminder>;
  listPending(botId: string, userId: string): Promise<Reminder[]>;
  /** Resolves false when no pending reminder with that id belongs to the user. */
  cancel(botId: string, userId: string, id: number): Promise<boolean>;
  /** Pending reminders due at or before `now`, oldest due first. */
  due(botId: string, now: number, limit: number): Promise<Reminder[]>;
  complete(id: number, completedAt: number): Promise<void>;
}
