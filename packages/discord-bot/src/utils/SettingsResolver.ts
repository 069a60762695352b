/**
 * @parley-module: SettingsResolver
 * @parley-risk: moderate
 * @parley-scope: core
 *
 * @description
 * Resolves an effective setting through the channel → guild → system default
 * cascade. The first scope holding a valid value wins outright; values are
 * never merged across scopes.
 *
 * @impact
 * Risk: A wrong precedence order makes admin overrides silently ineffective.
 */

import type { SettingScope, SettingScopeRef, SettingsStore, Verbosity } from '@parley/shared';
import { isVerbosity } from '@parley/shared';
import { ConfigurationUnavailableError } from '../orchestrator/errors.js';
import { createModuleLogger } from './logger.js';

const resolverLogger = createModuleLogger('settingsResolver');

export type MentionResponses = 'enabled' | 'disabled';

export interface SettingValues {
  verbosity: Verbosity;
  persona: string;
  max_context_messages: number;
  mention_responses: MentionResponses;
}

export type SettingKey = keyof SettingValues;

export type SettingSource = SettingScope | 'default';

export interface ResolvedSetting<K extends SettingKey> {
  key: K;
  value: SettingValues[K];
  source: SettingSource;
}

export const SETTING_DEFAULTS: SettingValues = {
  verbosity: 'normal',
  persona: 'muppet',
  max_context_messages: 40,
  mention_responses: 'enabled'
};

export const SETTING_KEYS: readonly SettingKey[] = ['verbosity', 'persona', 'max_context_messages', 'mention_responses'];

export const MAX_CONTEXT_MESSAGES_LIMIT = 100;

const SETTING_PARSERS: { [K in SettingKey]: (raw: string) => SettingValues[K] | undefined } = {
  verbosity: (raw) => {
    const normalized = raw.trim().toLowerCase();
    return isVerbosity(normalized) ? normalized : undefined;
  },
  persona: (raw) => {
    const normalized = raw.trim().toLowerCase();
    return /^[a-z0-9_-]{1,32}$/.test(normalized) ? normalized : undefined;
  },
  max_context_messages: (raw) => {
    const parsed = Number(raw.trim());
    return Number.isInteger(parsed) && parsed >= 1 && parsed <= MAX_CONTEXT_MESSAGES_LIMIT ? parsed : undefined;
  },
  mention_responses: (raw) => {
    const normalized = raw.trim().toLowerCase();
    return normalized === 'enabled' || normalized === 'disabled' ? normalized : undefined;
  }
};

export const isSettingKey = (value: string): value is SettingKey => SETTING_KEYS.some((key) => key === value);

/**
 * Validates a raw value for `key`. Returns undefined when the value is not acceptable.
 */
export function parseSettingValue<K extends SettingKey>(key: K, raw: string): SettingValues[K] | undefined {
  return SETTING_PARSERS[key](raw);
}

export class SettingsResolver {
  constructor(private readonly store: SettingsStore) {}

  /**
   * Throws ConfigurationUnavailableError when the store cannot be read.
   * A stored value that fails validation is treated as absent.
   */
  public async resolve<K extends SettingKey>(
    key: K,
    botId: string,
    channelId: string,
    guildId: string | null
  ): Promise<SettingValues[K]> {
    const resolved = await this.describe(key, botId, channelId, guildId);
    return resolved.value;
  }

  /**
   * Never throws; store failures fall back to the system default.
   */
  public async resolveOrDefault<K extends SettingKey>(
    key: K,
    botId: string,
    channelId: string,
    guildId: string | null
  ): Promise<SettingValues[K]> {
    try {
      return await this.resolve(key, botId, channelId, guildId);
    } catch (error) {
      if (error instanceof ConfigurationUnavailableError) {
        resolverLogger.warn(`${error.message}; using default "${String(SETTING_DEFAULTS[key])}"`);
        return SETTING_DEFAULTS[key];
      }
      throw error;
    }
  }

  /**
   * Effective value plus the scope it came from.
   */
  public async describe<K extends SettingKey>(
    key: K,
    botId: string,
    channelId: string,
    guildId: string | null
  ): Promise<ResolvedSetting<K>> {
    const scopes: SettingScopeRef[] = [{ scope: 'channel', botId, scopeId: channelId }];
    if (guildId) {
      scopes.push({ scope: 'guild', botId, scopeId: guildId });
    }

    for (const ref of scopes) {
      let raw: string | undefined;
      try {
        raw = await this.store.get(ref, key);
      } catch (error) {
        throw new ConfigurationUnavailableError(key, error);
      }

      if (raw === undefined) {
        continue;
      }

      const value = parseSettingValue(key, raw);
      if (value === undefined) {
        resolverLogger.warn(`Ignoring invalid stored value for "${key}" at ${ref.scope} scope`);
        continue;
      }

      resolverLogger.debug(`Resolved "${key}" from ${ref.scope} scope`);
      return { key, value, source: ref.scope };
    }

    return { key, value: SETTING_DEFAULTS[key], source: 'default' };
  }
}
