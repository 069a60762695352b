/**
 * @parley-module: Notices
 * @parley-risk: low
 * @parley-scope: utility
 *
 * @description: User-facing status messages sent in place of model output.
 */

import type { UpstreamErrorCategory } from './errors.js';

export const PLACEHOLDER_NOTICE = 'Thinking...';

export const TIMED_OUT_NOTICE = 'That request timed out before a reply was ready. Please try again.';

export const INTERNAL_FAILURE_NOTICE = 'Something went wrong while handling that request.';

const UPSTREAM_NOTICES: Record<UpstreamErrorCategory, string> = {
  auth: 'The language model rejected our credentials. An operator needs to check the API key.',
  quota: 'The language model is over its usage quota right now. Please try again later.',
  invalid_input: "The language model couldn't process that request. Try rephrasing or shortening it.",
  unavailable: 'The language model is unavailable right now. Please try again in a moment.',
  invalid_response: 'The language model returned an empty reply. Please try again.'
};

export function upstreamNotice(category: UpstreamErrorCategory): string {
  return UPSTREAM_NOTICES[category];
}

export function rateLimitNotice(retryAfterMs: number): string {
  const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
  return `You're sending requests too quickly. Try again in ${seconds}s.`;
}
