/**
 * @parley-module: PersonaRegistry
 * @parley-risk: moderate
 * @parley-scope: utility
 *
 * @description: Loads persona definitions, prompt modifiers and verbosity instructions from YAML
 * and composes the system prompt sent with each completion.
 *
 * @impact
 * Risk: Template errors change how every reply is framed. Missing personas fall back to a generic assistant.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';

export interface PersonaDefinition {
  key: string;
  name: string;
  description: string;
  prompt: string;
  /** Reminder text used when no completion is available; `{reminder}` is replaced. */
  reminderTemplate?: string;
}

export type PromptModifier = 'explain' | 'simple' | 'steps' | 'recipe' | 'analyze';

export type Verbosity = 'concise' | 'normal' | 'detailed';

export interface PersonaRegistryOptions {
  /** Optional override file path, typically driven by the PERSONA_CONFIG_PATH env var. */
  overridePath?: string;
  /** Replaces the bundled defaults file; used by tests. */
  defaultsPath?: string;
}

interface PersonaFileContents {
  personas: Map<string, PersonaDefinition>;
  modifiers: Partial<Record<PromptModifier, string>>;
  verbosity: Partial<Record<Verbosity, string>>;
}

export const FALLBACK_SYSTEM_PROMPT = 'You are a helpful assistant.';
export const FALLBACK_REMINDER_TEMPLATE = 'Reminder: **{reminder}**';

const PROMPT_MODIFIERS: readonly PromptModifier[] = ['explain', 'simple', 'steps', 'recipe', 'analyze'];
const VERBOSITY_LEVELS: readonly Verbosity[] = ['concise', 'normal', 'detailed'];

export const isPromptModifier = (value: string): value is PromptModifier =>
  PROMPT_MODIFIERS.some((modifier) => modifier === value);

export const isVerbosity = (value: string): value is Verbosity =>
  VERBOSITY_LEVELS.some((level) => level === value);

const resolveRelativePath = (target: string): string => {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(currentDir, target);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
};

/**
 * PersonaRegistry is the single source of truth for persona prompts. It merges
 * the bundled defaults with an optional operator-supplied override file.
 */
export class PersonaRegistry {
  private readonly contents: PersonaFileContents;

  constructor(options: PersonaRegistryOptions = {}) {
    const defaults = this.loadPersonaFile(
      options.defaultsPath ?? resolveRelativePath('../../prompts/personas.yaml'),
      false
    );

    if (options.overridePath) {
      const overrides = this.loadPersonaFile(options.overridePath, true);
      this.contents = {
        personas: new Map([...defaults.personas, ...overrides.personas]),
        modifiers: { ...defaults.modifiers, ...overrides.modifiers },
        verbosity: { ...defaults.verbosity, ...overrides.verbosity }
      };
    } else {
      this.contents = defaults;
    }
  }

  public getPersona(key: string): PersonaDefinition | undefined {
    return this.contents.personas.get(key);
  }

  public hasPersona(key: string): boolean {
    return this.contents.personas.has(key);
  }

  /**
   * Personas sorted by key so listings are stable.
   */
  public listPersonas(): PersonaDefinition[] {
    return [...this.contents.personas.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * In-character reminder text for when the model cannot write one.
   */
  public getReminderFallback(personaKey: string, reminder: string): string {
    const template = this.getPersona(personaKey)?.reminderTemplate ?? FALLBACK_REMINDER_TEMPLATE;
    return template.split('{reminder}').join(reminder);
  }

  /**
   * Persona prompt, then modifier instruction, then verbosity instruction,
   * separated by single spaces. Unknown personas use the generic assistant prompt.
   */
  public getSystemPrompt(personaKey: string, modifier?: PromptModifier, verbosity?: Verbosity): string {
    const parts = [this.getPersona(personaKey)?.prompt ?? FALLBACK_SYSTEM_PROMPT];

    if (modifier) {
      const instruction = this.contents.modifiers[modifier];
      if (instruction) parts.push(instruction);
    }

    if (verbosity) {
      const instruction = this.contents.verbosity[verbosity];
      if (instruction) parts.push(instruction);
    }

    return parts.join(' ');
  }

  private loadPersonaFile(filePath: string, optional: boolean): PersonaFileContents {
    const resolvedPath = path.isAbsolute(filePath) ? filePath : path.resolve(filePath);
    const empty: PersonaFileContents = { personas: new Map(), modifiers: {}, verbosity: {} };

    if (!fs.existsSync(resolvedPath)) {
      if (optional) {
        return empty;
      }
      throw new Error(`Persona configuration file not found: ${resolvedPath}`);
    }

    const parsed: unknown = yaml.load(fs.readFileSync(resolvedPath, 'utf-8'));
    if (!isRecord(parsed)) {
      throw new Error(`Persona configuration did not parse to an object: ${resolvedPath}`);
    }

    const result = empty;

    if (isRecord(parsed.personas)) {
      for (const [key, entry] of Object.entries(parsed.personas)) {
        if (!isRecord(entry)) continue;
        const prompt = readString(entry, 'prompt') ?? readString(entry, 'template');
        if (!prompt) {
          throw new Error(`Persona "${key}" in ${resolvedPath} has no prompt`);
        }
        result.personas.set(key, {
          key,
          name: readString(entry, 'name') ?? key,
          description: readString(entry, 'description') ?? '',
          prompt,
          reminderTemplate: readString(entry, 'reminder')
        });
      }
    }

    if (isRecord(parsed.modifiers)) {
      for (const [key, value] of Object.entries(parsed.modifiers)) {
        if (isPromptModifier(key) && typeof value === 'string') {
          result.modifiers[key] = value.trim();
        }
      }
    }

    if (isRecord(parsed.verbosity)) {
      for (const [key, value] of Object.entries(parsed.verbosity)) {
        if (isVerbosity(key) && typeof value === 'string') {
          result.verbosity[key] = value.trim();
        }
      }
    }

    return result;
  }
}
