/**
 * @parley-module: InteractionOrchestrator
 * @parley-risk: critical
 * @parley-scope: core
 *
 * @description
 * Turns each inbound interaction into an ordered, deadline-bound reply:
 * rate check, configuration, acknowledgment, completion under a cancellable
 * deadline, splitting and delivery. Every request runs as its own task; a
 * failure in one task never reaches another or the process.
 *
 * @impact
 * Risk: Sequencing errors surface directly to users as missing, duplicated or stale replies.
 */

import type { ConversationTurn, PersonaPreferenceStore, PersonaRegistry, UsageOutcome, UsageSink, Verbosity } from '@parley/shared';
import { ConversationContext } from '../state/ConversationContext.js';
import { createModuleLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { SETTING_DEFAULTS, SettingsResolver } from '../utils/SettingsResolver.js';
import { segment } from '../utils/response/ResponseSplitter.js';
import { DeferredInteraction } from './DeferredInteraction.js';
import {
  InternalInvariantViolationError,
  RateLimitedError,
  TransportError,
  UpstreamError,
  UpstreamTimeoutError
} from './errors.js';
import {
  INTERNAL_FAILURE_NOTICE,
  TIMED_OUT_NOTICE,
  rateLimitNotice,
  upstreamNotice
} from './notices.js';
import type {
  InteractionPlan,
  InteractionPlanner,
  InteractionRequest,
  LLMBackend,
  LlmPlan,
  LocalPlan,
  ReplyContent,
  ReplyTransport
} from './types.js';

const orchestratorLogger = createModuleLogger('interactionOrchestrator');

export interface OrchestratorOptions {
  /** Platform acknowledgment deadline measured from `receivedAt`. */
  ackDeadlineMs: number;
  /** Completion deadline measured from acknowledgment. */
  completionTimeoutMs: number;
  maxChunkSize: number;
  /** Reserved slice of the ack budget for the acknowledgment call itself. */
  ackSafetyMarginMs?: number;
}

export interface OrchestratorDependencies {
  rateLimiter: RateLimiter;
  settings: SettingsResolver;
  preferences: PersonaPreferenceStore;
  context: ConversationContext;
  personas: PersonaRegistry;
  planner: InteractionPlanner;
  backend: LLMBackend;
  usage: UsageSink;
  options: OrchestratorOptions;
  now?: () => number;
}

interface ResolvedConfiguration {
  persona: string;
  verbosity: Verbosity;
  /** Turns preceding this prompt. */
  history: ConversationTurn[];
  /** Set once the prompt is stored. */
  promptTurnId?: number;
}

type CompletionOutcome<T> =
  | { kind: 'result'; value: T }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout' };

const DEFAULT_ACK_SAFETY_MARGIN_MS = 500;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class InteractionOrchestrator {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => number;
  private readonly ackSafetyMarginMs: number;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.now = deps.now ?? Date.now;
    this.ackSafetyMarginMs = Math.max(
      0,
      Math.min(deps.options.ackSafetyMarginMs ?? DEFAULT_ACK_SAFETY_MARGIN_MS, deps.options.ackDeadlineMs / 2)
    );
  }

  /**
   * Dispatches the request into its own task and returns immediately.
   */
  public onEvent(request: InteractionRequest, transport: ReplyTransport): void {
    const task: Promise<void> = this.handle(request, transport)
      .then(
        () => undefined,
        (error: unknown) => {
          orchestratorLogger.error(`Interaction task ${request.id} escaped its boundary: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Resolves once every dispatched task has settled, including tasks started while waiting.
   */
  public async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  public get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Runs one interaction to a terminal state. Never rejects.
   */
  public async handle(request: InteractionRequest, transport: ReplyTransport): Promise<DeferredInteraction> {
    const interaction = new DeferredInteraction(request, transport, {
      ackDeadlineMs: this.deps.options.ackDeadlineMs,
      completionTimeoutMs: this.deps.options.completionTimeoutMs,
      now: this.now
    });
    let persona: string | undefined;

    try {
      const decision = this.deps.rateLimiter.check(request.identity.botId, request.identity.userId);
      if (!decision.allowed) {
        orchestratorLogger.info(`${new RateLimitedError(decision.retryAfterMs).message} (interaction ${request.id})`);
        await interaction.acknowledge({
          mode: 'immediate',
          reply: { content: rateLimitNotice(decision.retryAfterMs) },
          ephemeral: true
        });
        interaction.transition('delivered');
        this.recordUsage(interaction, 'rate_limited');
        return interaction;
      }
      interaction.transition('rate_checked');

      const plan: InteractionPlan = this.deps.planner.plan(request);
      if (plan.type === 'local') {
        await this.runLocal(interaction, plan);
      } else {
        persona = await this.runCompletion(interaction, plan);
      }
    } catch (error) {
      await this.failAtBoundary(interaction, error);
    }

    this.recordUsage(interaction, this.outcomeOf(interaction), persona);
    return interaction;
  }

  private async runLocal(interaction: DeferredInteraction, plan: LocalPlan): Promise<void> {
    interaction.transition('configured');

    const work = plan.run();
    const early = await this.withinBudget(work, this.configureBudgetMs(interaction), 'local action');

    if (early.done) {
      // Fast path: acknowledgment and reply coincide.
      await interaction.acknowledge({ mode: 'immediate', reply: early.value, ephemeral: plan.ephemeral });
      interaction.transition('acknowledged');
      interaction.transition('delivered');
      return;
    }

    await interaction.acknowledge({ mode: 'deferred', ephemeral: plan.ephemeral });
    interaction.transition('acknowledged');
    interaction.transition('completing');
    const outcome = await this.raceCompletion(interaction, () => work);
    await this.deliverOutcome(interaction, outcome, (reply) => [reply]);
  }

  /**
   * Returns the persona used, for usage attribution.
   */
  private async runCompletion(interaction: DeferredInteraction, plan: LlmPlan): Promise<string> {
    const { request } = interaction;
    const resolved = await this.withinBudget(this.configure(request, plan.prompt), this.configureBudgetMs(interaction), 'configuration');
    const configuration: ResolvedConfiguration = resolved.done
      ? resolved.value
      : { persona: SETTING_DEFAULTS.persona, verbosity: SETTING_DEFAULTS.verbosity, history: [] };
    interaction.transition('configured');

    await interaction.acknowledge({ mode: 'deferred', ephemeral: plan.ephemeral });
    interaction.transition('acknowledged');
    interaction.transition('completing');

    const systemPrompt = this.deps.personas.getSystemPrompt(configuration.persona, plan.modifier, configuration.verbosity);
    const outcome = await this.raceCompletion(interaction, (signal) =>
      this.deps.backend.complete(
        { systemPrompt, history: configuration.history, prompt: plan.prompt, persona: configuration.persona },
        signal
      )
    );

    const delivered = await this.deliverOutcome(interaction, outcome, (text) =>
      segment(text, this.deps.options.maxChunkSize).map((content) => ({ content }))
    );
    if (delivered && outcome.kind === 'result') {
      await this.recordReply(request, outcome.value, configuration.promptTurnId);
    }
    return configuration.persona;
  }

  /**
   * Persona, verbosity and history; stores the prompt as part of loading the
   * history. Lookup failures degrade to defaults.
   */
  private async configure(request: InteractionRequest, prompt: string): Promise<ResolvedConfiguration> {
    const { identity, guildId } = request;
    const { settings, preferences, personas } = this.deps;

    const [preferred, cascadePersona, verbosity, maxTurns] = await Promise.all([
      preferences.getPersona(identity.botId, identity.userId).catch((error: unknown) => {
        orchestratorLogger.warn(`Persona preference lookup failed: ${describeError(error)}`);
        return undefined;
      }),
      settings.resolveOrDefault('persona', identity.botId, identity.channelId, guildId),
      settings.resolveOrDefault('verbosity', identity.botId, identity.channelId, guildId),
      settings.resolveOrDefault('max_context_messages', identity.botId, identity.channelId, guildId)
    ]);

    const recorded = await this.deps.context
      .recordPrompt(identity, { role: 'user', content: prompt, timestamp: request.receivedAt }, maxTurns)
      .catch((error: unknown) => {
        orchestratorLogger.warn(`History lookup failed; continuing without context: ${describeError(error)}`);
        return undefined;
      });

    const persona = preferred && personas.hasPersona(preferred) ? preferred : cascadePersona;
    return { persona, verbosity, history: recorded?.history ?? [], promptTurnId: recorded?.turnId };
  }

  /**
   * Runs `start` under the completion deadline. On expiry the signal aborts and
   * the eventual result, if any, is discarded.
   */
  private async raceCompletion<T>(
    interaction: DeferredInteraction,
    start: (signal: AbortSignal) => Promise<T>
  ): Promise<CompletionOutcome<T>> {
    const controller = new AbortController();
    const deadline = interaction.completionDeadlineAt ?? this.now() + this.deps.options.completionTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const settled = start(controller.signal).then(
      (value): CompletionOutcome<T> => ({ kind: 'result', value }),
      (error: unknown): CompletionOutcome<T> => ({ kind: 'error', error })
    );
    const timeout = new Promise<CompletionOutcome<T>>((resolve) => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), Math.max(0, deadline - this.now()));
    });

    const outcome = await Promise.race([settled, timeout]);
    clearTimeout(timer);

    if (outcome.kind === 'timeout') {
      controller.abort(new UpstreamTimeoutError('Completion deadline elapsed'));
      void settled.then((late) => {
        if (late.kind === 'result') {
          orchestratorLogger.debug(`Discarded late result for interaction ${interaction.request.id}`);
        }
      });
    }

    return outcome;
  }

  /**
   * Sends the terminal message for `outcome` and moves to the matching terminal
   * state. The first reply replaces the placeholder; the rest go out as
   * followups in order. Returns true when content was delivered.
   */
  private async deliverOutcome<T>(
    interaction: DeferredInteraction,
    outcome: CompletionOutcome<T>,
    toReplies: (value: T) => ReplyContent[]
  ): Promise<boolean> {
    const { request } = interaction;

    if (outcome.kind === 'result') {
      const [first, ...rest] = toReplies(outcome.value);
      await interaction.editPlaceholder(first);
      for (const reply of rest) {
        await interaction.sendFollowup(reply.content);
      }
      interaction.transition('delivered');
      orchestratorLogger.debug(`Delivered ${rest.length + 1} message(s) for interaction ${request.id}`);
      return true;
    }

    if (outcome.kind === 'timeout' || outcome.error instanceof UpstreamTimeoutError) {
      orchestratorLogger.warn(`Interaction ${request.id} expired before completion`);
      await interaction.editPlaceholder({ content: TIMED_OUT_NOTICE });
      interaction.transition('expired');
      return false;
    }

    const { error } = outcome;
    if (error instanceof UpstreamError) {
      orchestratorLogger.error(`Upstream ${error.category} failure for interaction ${request.id}: ${error.message}`);
      await interaction.editPlaceholder({ content: upstreamNotice(error.category) });
    } else {
      orchestratorLogger.error(`Completion failed for interaction ${request.id}: ${describeError(error)}`);
      await interaction.editPlaceholder({ content: INTERNAL_FAILURE_NOTICE });
    }
    interaction.transition('failed');
    return false;
  }

  private async recordReply(request: InteractionRequest, reply: string, promptTurnId?: number): Promise<void> {
    try {
      await this.deps.context.recordReply(
        request.identity,
        { role: 'assistant', content: reply, timestamp: this.now() },
        promptTurnId
      );
    } catch (error) {
      orchestratorLogger.warn(`Failed to record the reply for interaction ${request.id}: ${describeError(error)}`);
    }
  }

  /**
   * Task boundary: log, then make one best-effort attempt to tell the user.
   */
  private async failAtBoundary(interaction: DeferredInteraction, error: unknown): Promise<void> {
    const { request } = interaction;

    if (error instanceof TransportError) {
      orchestratorLogger.error(`Delivery failed for interaction ${request.id}; user received no reply: ${error.message}`);
    } else if (error instanceof InternalInvariantViolationError) {
      orchestratorLogger.error(`Invariant violated in interaction ${request.id}: ${error.message}`);
    } else {
      orchestratorLogger.error(`Unexpected failure in interaction ${request.id}: ${describeError(error)}`);
    }

    if (interaction.isTerminal) {
      return;
    }

    if (!(error instanceof TransportError)) {
      try {
        if (!interaction.isAcknowledged) {
          await interaction.acknowledge({ mode: 'immediate', reply: { content: INTERNAL_FAILURE_NOTICE }, ephemeral: true });
        } else if (!interaction.placeholderEdited) {
          await interaction.editPlaceholder({ content: INTERNAL_FAILURE_NOTICE });
        } else {
          await interaction.sendFollowup(INTERNAL_FAILURE_NOTICE);
        }
      } catch (noticeError) {
        orchestratorLogger.error(`Could not send failure notice for interaction ${request.id}: ${describeError(noticeError)}`);
      }
    }

    interaction.transition('failed');
  }

  private configureBudgetMs(interaction: DeferredInteraction): number {
    return Math.max(0, interaction.ackBudgetMs() - this.ackSafetyMarginMs);
  }

  /**
   * Waits for `work` at most `budgetMs`. A late failure of `work` is still logged.
   */
  private async withinBudget<T>(
    work: Promise<T>,
    budgetMs: number,
    label: string
  ): Promise<{ done: true; value: T } | { done: false }> {
    let timer: NodeJS.Timeout | undefined;
    const guarded = work.then(
      (value) => ({ done: true as const, value }),
      (error: unknown) => {
        orchestratorLogger.warn(`${label} failed: ${describeError(error)}`);
        throw error;
      }
    );
    const budget = new Promise<{ done: false }>((resolve) => {
      timer = setTimeout(() => resolve({ done: false }), budgetMs);
    });

    try {
      const result = await Promise.race([guarded, budget]);
      if (!result.done) {
        orchestratorLogger.warn(`${label} exceeded the acknowledgment budget of ${budgetMs}ms; continuing`);
        void guarded.catch((error: unknown) => {
          orchestratorLogger.debug(`Late ${label} failure ignored: ${describeError(error)}`);
        });
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }

  private outcomeOf(interaction: DeferredInteraction): UsageOutcome {
    switch (interaction.state) {
      case 'delivered':
        return 'delivered';
      case 'expired':
        return 'expired';
      default:
        return 'failed';
    }
  }

  private recordUsage(interaction: DeferredInteraction, outcome: UsageOutcome, persona?: string): void {
    const { request } = interaction;
    try {
      this.deps.usage.record({
        identity: request.identity,
        kind: `${request.kind}:${request.name}`,
        outcome,
        latencyMs: this.now() - request.receivedAt,
        persona
      });
    } catch (error) {
      orchestratorLogger.warn(`Usage sink threw for interaction ${request.id}: ${describeError(error)}`);
    }
  }
}
