/**
 * @parley-module: OrchestratorTypes
 * @parley-risk: moderate
 * @parley-scope: interface
 *
 * @description
 * Boundary shapes between the Discord adapters, the orchestrator and the LLM backend.
 */

import type { ConversationTurn, Identity, PromptModifier } from '@parley/shared';

export type InteractionKind = 'message' | 'command' | 'button' | 'modal' | 'context-menu';

/**
 * One inbound event, frozen at the adapter boundary.
 */
export interface InteractionRequest {
  readonly id: string;
  readonly kind: InteractionKind;
  readonly identity: Identity;
  /** Null for direct messages. */
  readonly guildId: string | null;
  /** Command name, component custom id, modal id or context-menu name. */
  readonly name: string;
  /** Primary text payload: message content, `prompt` option or target message content. */
  readonly text: string;
  /** Command options and modal fields as strings. */
  readonly fields: Readonly<Record<string, string>>;
  /** Holds Manage Server in this guild. */
  readonly isAdmin: boolean;
  /** Holds Administrator in this guild; required to choose the bot admin role. */
  readonly isServerAdmin: boolean;
  /** Guild role ids of the invoking member; empty in direct messages. */
  readonly roleIds: readonly string[];
  /** Epoch milliseconds at which the platform delivered the event. */
  readonly receivedAt: number;
}

export interface ReplyButton {
  customId: string;
  label: string;
}

export interface ModalField {
  customId: string;
  label: string;
  style: 'short' | 'paragraph';
  required?: boolean;
  maxLength?: number;
}

export interface ModalSpec {
  customId: string;
  title: string;
  fields: readonly ModalField[];
}

/**
 * A complete reply. `modal` is only honoured on an immediate acknowledgment of an
 * interaction; transports that cannot open modals send `content` instead.
 */
export interface ReplyContent {
  content: string;
  buttons?: readonly ReplyButton[];
  modal?: ModalSpec;
}

export type AcknowledgeOptions =
  | { mode: 'deferred'; ephemeral?: boolean }
  | { mode: 'immediate'; reply: ReplyContent; ephemeral?: boolean };

export interface AckHandle {
  /** Platform id of the acknowledgment (interaction or placeholder message). */
  readonly id: string;
  readonly mode: AcknowledgeOptions['mode'];
}

/**
 * Outbound side of one interaction. Implementations wrap platform failures in TransportError.
 */
export interface ReplyTransport {
  acknowledge(options: AcknowledgeOptions): Promise<AckHandle>;
  editAcknowledgment(handle: AckHandle, reply: ReplyContent): Promise<void>;
  sendFollowup(content: string): Promise<void>;
}

export interface CompletionRequest {
  systemPrompt: string;
  history: readonly ConversationTurn[];
  prompt: string;
  /** Used for logging and cost attribution only. */
  persona: string;
}

/**
 * Language-model backend. Must stop work promptly once `signal` aborts.
 */
export interface LLMBackend {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}

export interface LlmPlan {
  type: 'llm';
  prompt: string;
  modifier?: PromptModifier;
  ephemeral?: boolean;
}

export interface LocalPlan {
  type: 'local';
  ephemeral?: boolean;
  /** Produces the final reply. */
  run(): Promise<ReplyContent>;
}

export type InteractionPlan = LlmPlan | LocalPlan;

export interface InteractionPlanner {
  plan(request: InteractionRequest): InteractionPlan;
}
