/**
 * @parley-module: ReminderScheduler
 * @parley-risk: moderate
 * @parley-scope: core
 *
 * @description
 * Polls the reminder store and delivers due reminders in the owner's persona.
 * A reminder is marked complete whether or not delivery worked, so a broken
 * channel never produces repeats; the user can set a new one.
 */

import type { PersonaPreferenceStore, PersonaRegistry, Reminder, ReminderStore } from '@parley/shared';
import type { LLMBackend } from '../orchestrator/types.js';
import { createModuleLogger } from '../utils/logger.js';
import { segment } from '../utils/response/ResponseSplitter.js';
import { SETTING_DEFAULTS, SettingsResolver } from '../utils/SettingsResolver.js';

const schedulerLogger = createModuleLogger('reminderScheduler');

const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;
const DEFAULT_BATCH_SIZE = 25;

export const REMINDER_DELIVERY_PROMPT = 'Please deliver this reminder to me now.';

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Posts one message to a channel, pinging only `userId`.
 */
export interface ReminderSender {
  send(channelId: string, content: string, userId: string): Promise<void>;
}

export interface ReminderSchedulerOptions {
  pollIntervalMs: number;
  generationTimeoutMs?: number;
  batchSize?: number;
}

export interface ReminderSchedulerDependencies {
  botId: string;
  reminders: ReminderStore;
  preferences: PersonaPreferenceStore;
  settings: SettingsResolver;
  personas: PersonaRegistry;
  backend: LLMBackend;
  sender: ReminderSender;
  now?: () => number;
  options: ReminderSchedulerOptions;
}

export function reminderSystemPrompt(personaPrompt: string, message: string): string {
  return [
    personaPrompt,
    '',
    'Your task is to deliver a reminder to the user in your characteristic style. ' +
      'Keep it brief (1-2 sentences) but in character.',
    `The reminder message is: "${message}"`
  ].join('\n');
}

export class ReminderScheduler {
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private running: Promise<void> | undefined;

  constructor(private readonly deps: ReminderSchedulerDependencies) {
    this.now = deps.now ?? Date.now;
  }

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runTick(), this.deps.options.pollIntervalMs);
    this.timer.unref();
    schedulerLogger.info(`Reminder scheduler started; polling every ${this.deps.options.pollIntervalMs}ms`);
  }

  /**
   * Stops polling and waits for a delivery pass that is already underway.
   */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.running;
  }

  /**
   * Delivers every reminder due now. Returns how many were delivered.
   */
  public async tick(): Promise<number> {
    const { reminders, botId } = this.deps;
    const due = await reminders.due(botId, this.now(), this.deps.options.batchSize ?? DEFAULT_BATCH_SIZE);
    if (due.length === 0) {
      schedulerLogger.debug('No due reminders');
      return 0;
    }

    schedulerLogger.info(`Processing ${due.length} due reminder(s)`);
    let delivered = 0;
    for (const reminder of due) {
      if (await this.deliver(reminder)) {
        delivered += 1;
      }
      await reminders.complete(reminder.id, this.now());
    }
    return delivered;
  }

  private runTick(): void {
    if (this.running) {
      schedulerLogger.debug('Previous reminder pass still running; skipping this one');
      return;
    }
    this.running = this.tick()
      .then(
        () => undefined,
        (error: unknown) => {
          schedulerLogger.error(`Reminder pass failed: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.running = undefined;
      });
  }

  private async deliver(reminder: Reminder): Promise<boolean> {
    try {
      const text = await this.compose(reminder);
      for (const chunk of segment(`<@${reminder.userId}>\n\n${text}`)) {
        await this.deps.sender.send(reminder.channelId, chunk, reminder.userId);
      }
      schedulerLogger.info(`Delivered reminder #${reminder.id}`);
      return true;
    } catch (error) {
      schedulerLogger.warn(`Failed to deliver reminder #${reminder.id}: ${describeError(error)}`);
      return false;
    }
  }

  private async compose(reminder: Reminder): Promise<string> {
    const { personas, backend } = this.deps;
    const persona = await this.personaFor(reminder);
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(),
      this.deps.options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    );

    try {
      const generated = await backend.complete(
        {
          systemPrompt: reminderSystemPrompt(personas.getSystemPrompt(persona), reminder.message),
          history: [],
          prompt: REMINDER_DELIVERY_PROMPT,
          persona
        },
        controller.signal
      );
      const text = generated.trim();
      return text || personas.getReminderFallback(persona, reminder.message);
    } catch (error) {
      schedulerLogger.warn(`Reminder #${reminder.id} text generation failed; using the ${persona} fallback: ${describeError(error)}`);
      return personas.getReminderFallback(persona, reminder.message);
    } finally {
      clearTimeout(timer);
    }
  }

  private async personaFor(reminder: Reminder): Promise<string> {
    const { preferences, settings, personas, botId } = this.deps;
    try {
      const preferred = await preferences.getPersona(botId, reminder.userId);
      if (preferred && personas.hasPersona(preferred)) {
        return preferred;
      }
      return await settings.resolveOrDefault('persona', botId, reminder.channelId, reminder.guildId);
    } catch (error) {
      schedulerLogger.warn(`Persona lookup for reminder #${reminder.id} failed: ${describeError(error)}`);
      return SETTING_DEFAULTS.persona;
    }
  }
}
