/**
 * @parley-module: OrchestratorErrors
 * @parley-risk: moderate
 * @parley-scope: interface
 *
 * @description
 * Error taxonomy for the interaction pipeline. Each class maps to one
 * user-facing notice and one log severity in the orchestrator.
 */

export class ParleyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Expected, user-caused. Logged at info. */
export class RateLimitedError extends ParleyError {
  constructor(public readonly retryAfterMs: number) {
    super(`Rate limited; retry after ${retryAfterMs}ms`);
  }
}

/** A settings lookup failed; callers recover with the system default. */
export class ConfigurationUnavailableError extends ParleyError {
  constructor(public readonly key: string, cause: unknown) {
    super(`Could not resolve setting "${key}"`, { cause });
  }
}

export class UpstreamTimeoutError extends ParleyError {
  constructor(message = 'Upstream call timed out or was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type UpstreamErrorCategory = 'auth' | 'quota' | 'invalid_input' | 'unavailable' | 'invalid_response';

export class UpstreamError extends ParleyError {
  public readonly status?: number;

  constructor(
    public readonly category: UpstreamErrorCategory,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export type TransportOperation = 'acknowledge' | 'edit' | 'followup';

export class TransportError extends ParleyError {
  constructor(public readonly operation: TransportOperation, cause: unknown) {
    super(`Transport ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/** A lifecycle rule was broken. Fatal to the interaction, never to the process. */
export class InternalInvariantViolationError extends ParleyError {}
