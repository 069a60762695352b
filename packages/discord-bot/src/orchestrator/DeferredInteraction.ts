/**
 * @parley-module: DeferredInteraction
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description
 * Lifecycle of one interaction: guarded state transitions plus the only path
 * to the reply transport. Enforces a single placeholder edit and no sends once
 * a terminal state is reached.
 *
 * @impact
 * Risk: A missed guard would let a stale reply land after the user saw "timed out".
 */

import { createModuleLogger } from '../utils/logger.js';
import { InternalInvariantViolationError, TransportError } from './errors.js';
import type { AckHandle, AcknowledgeOptions, InteractionRequest, ReplyContent, ReplyTransport } from './types.js';

const lifecycleLogger = createModuleLogger('deferredInteraction');

export type InteractionState =
  | 'received'
  | 'rate_checked'
  | 'configured'
  | 'acknowledged'
  | 'completing'
  | 'delivered'
  | 'failed'
  | 'expired';

export type TerminalState = Extract<InteractionState, 'delivered' | 'failed' | 'expired'>;

const TRANSITIONS: Record<InteractionState, readonly InteractionState[]> = {
  received: ['rate_checked', 'delivered', 'failed'],
  rate_checked: ['configured', 'failed'],
  configured: ['acknowledged', 'failed'],
  acknowledged: ['completing', 'delivered', 'failed'],
  completing: ['delivered', 'failed', 'expired'],
  delivered: [],
  failed: [],
  expired: []
};

export const isTerminalState = (state: InteractionState): state is TerminalState =>
  state === 'delivered' || state === 'failed' || state === 'expired';

export interface DeferredInteractionOptions {
  ackDeadlineMs: number;
  completionTimeoutMs: number;
  now: () => number;
}

export class DeferredInteraction {
  private currentState: InteractionState = 'received';
  private handle: AckHandle | undefined;
  private editUsed = false;
  private acknowledgedAt: number | undefined;
  private readonly trail: InteractionState[] = ['received'];

  /** Epoch ms by which the platform expects an acknowledgment. */
  public readonly ackDeadlineAt: number;

  constructor(
    public readonly request: InteractionRequest,
    private readonly transport: ReplyTransport,
    private readonly options: DeferredInteractionOptions
  ) {
    this.ackDeadlineAt = request.receivedAt + options.ackDeadlineMs;
  }

  public get state(): InteractionState {
    return this.currentState;
  }

  /** States visited so far, in order. */
  public get history(): readonly InteractionState[] {
    return this.trail;
  }

  public get isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  public get isAcknowledged(): boolean {
    return this.handle !== undefined;
  }

  public get placeholderEdited(): boolean {
    return this.editUsed;
  }

  /** Undefined until acknowledged. */
  public get completionDeadlineAt(): number | undefined {
    return this.acknowledgedAt === undefined ? undefined : this.acknowledgedAt + this.options.completionTimeoutMs;
  }

  /** Milliseconds left before the ack deadline; negative once missed. */
  public ackBudgetMs(): number {
    return this.ackDeadlineAt - this.options.now();
  }

  public transition(next: InteractionState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InternalInvariantViolationError(
        `Illegal transition ${this.currentState} -> ${next} for interaction ${this.request.id}`
      );
    }
    this.currentState = next;
    this.trail.push(next);
  }

  /**
   * Sends the acknowledgment. A missed deadline is logged but the ack is still attempted.
   * Immediate acks carry the final reply; callers transition to a terminal state afterwards.
   */
  public async acknowledge(options: AcknowledgeOptions): Promise<AckHandle> {
    this.assertSendable('acknowledge');
    if (this.handle) {
      throw new InternalInvariantViolationError(`Interaction ${this.request.id} was already acknowledged`);
    }

    const breachMs = -this.ackBudgetMs();
    if (breachMs > 0) {
      lifecycleLogger.warn(`Acknowledgment deadline missed by ${breachMs}ms for interaction ${this.request.id}`);
    }

    const handle = await this.withRetry('acknowledge', () => this.transport.acknowledge(options));
    this.handle = handle;
    this.acknowledgedAt = this.options.now();
    return handle;
  }

  /**
   * Replaces the placeholder. Allowed exactly once per interaction.
   */
  public async editPlaceholder(reply: ReplyContent): Promise<void> {
    this.assertSendable('edit');
    const handle = this.handle;
    if (!handle || handle.mode !== 'deferred') {
      throw new InternalInvariantViolationError(`Interaction ${this.request.id} has no placeholder to edit`);
    }
    if (this.editUsed) {
      throw new InternalInvariantViolationError(`Placeholder for interaction ${this.request.id} was already edited`);
    }
    // Claimed before the send so a concurrent caller cannot edit twice.
    this.editUsed = true;
    await this.withRetry('edit', () => this.transport.editAcknowledgment(handle, reply));
  }

  public async sendFollowup(content: string): Promise<void> {
    this.assertSendable('followup');
    if (!this.handle) {
      throw new InternalInvariantViolationError(`Interaction ${this.request.id} sent a followup before acknowledging`);
    }
    await this.withRetry('followup', () => this.transport.sendFollowup(content));
  }

  private assertSendable(operation: string): void {
    if (this.isTerminal) {
      throw new InternalInvariantViolationError(
        `Refusing ${operation} for interaction ${this.request.id} in terminal state ${this.currentState}`
      );
    }
  }

  /**
   * One retry on TransportError; anything else propagates untouched.
   */
  private async withRetry<T>(operation: 'acknowledge' | 'edit' | 'followup', send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      lifecycleLogger.warn(`Retrying ${operation} for interaction ${this.request.id}: ${error.message}`);
      return send();
    }
  }
}
