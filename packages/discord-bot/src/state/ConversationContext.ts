/**
 * @parley-module: ConversationContext
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description
 * Ordered conversation history per (botId, userId, channelId) on top of a
 * ConversationStore. Writes for one identity run one at a time; reads wait for
 * queued writes so a reply always sees the turn that triggered it. A reply is
 * stored against the prompt it answers, so concurrent exchanges for one
 * identity still read back prompt, reply, prompt, reply.
 *
 * @impact
 * Risk: Interleaved writes would reorder history sent to the model.
 */

import type { ConversationStore, ConversationTurn, Identity } from '@parley/shared';

export const DEFAULT_MAX_TURNS = 40;

export interface RecordedPrompt {
  /** Store id of the prompt, for pairing the reply with it. */
  turnId: number;
  /** Turns preceding the prompt, oldest first. */
  history: ConversationTurn[];
}

const identityKey = (identity: Identity): string =>
  JSON.stringify([identity.botId, identity.userId, identity.channelId]);

export class ConversationContext {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly store: ConversationStore) {}

  public append(identity: Identity, turn: ConversationTurn): Promise<number> {
    return this.enqueue(identity, () => this.store.append(identity, turn));
  }

  /**
   * Stores a prompt and loads the window that precedes it, as one queued operation.
   */
  public recordPrompt(identity: Identity, turn: ConversationTurn, maxTurns: number = DEFAULT_MAX_TURNS): Promise<RecordedPrompt> {
    const limit = Math.max(0, Math.floor(maxTurns));
    return this.enqueue(identity, async () => {
      const turnId = await this.store.append(identity, turn);
      if (limit === 0) {
        return { turnId, history: [] };
      }
      // The prompt holds the newest id and no reply yet, so it reads back last.
      const recent = await this.store.read(identity, limit + 1);
      return { turnId, history: recent.slice(0, -1) };
    });
  }

  /**
   * Stores a reply. With `promptTurnId` it reads back directly after that prompt.
   */
  public recordReply(identity: Identity, turn: ConversationTurn, promptTurnId?: number): Promise<number> {
    return this.enqueue(identity, () => this.store.append(identity, turn, promptTurnId));
  }

  /**
   * Last `maxTurns` turns, oldest first. Stored history is never truncated.
   */
  public window(identity: Identity, maxTurns: number = DEFAULT_MAX_TURNS): Promise<ConversationTurn[]> {
    if (maxTurns <= 0) {
      return Promise.resolve([]);
    }
    return this.enqueue(identity, () => this.store.read(identity, Math.floor(maxTurns)));
  }

  /**
   * Removes the stored history for one identity. Resolves with the number of turns removed.
   */
  public clear(identity: Identity): Promise<number> {
    return this.enqueue(identity, () => this.store.clear(identity));
  }

  /** Identities with queued operations. */
  public get pendingIdentities(): number {
    return this.tails.size;
  }

  private enqueue<T>(identity: Identity, operation: () => Promise<T>): Promise<T> {
    const key = identityKey(identity);
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(operation);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }
}
