/**
 * @description: Parses compact reminder delays such as `30m`, `2h` or `1d2h30m`.
 * @parley-scope: utility
 * @parley-module: ReminderDelay
 * @parley-risk: low - Bad input yields undefined and the caller replies with usage help.
 */

export const MIN_REMINDER_DELAY_MS = 60_000;
export const MAX_REMINDER_DELAY_MS = 30 * 24 * 60 * 60_000;

const DELAY_PATTERN = /^(?:\d+[dhm])+$/;
const DELAY_PART = /(\d+)([dhm])/g;

const unitMs = (unit: string): number => {
  switch (unit) {
    case 'd':
      return 24 * 60 * 60_000;
    case 'h':
      return 60 * 60_000;
    default:
      return 60_000;
  }
};

/**
 * Returns the delay in milliseconds, or undefined when the text is malformed
 * or falls outside one minute to thirty days.
 */
export function parseReminderDelay(raw: string): number | undefined {
  const value = raw.replace(/\s+/g, '').toLowerCase();
  if (!DELAY_PATTERN.test(value)) {
    return undefined;
  }

  let total = 0;
  for (const [, amount, unit] of value.matchAll(DELAY_PART)) {
    total += Number(amount) * unitMs(unit);
  }

  return total >= MIN_REMINDER_DELAY_MS && total <= MAX_REMINDER_DELAY_MS ? total : undefined;
}
