const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parse a duration string such as `500ms`, `30s`, `1m30s` or `2h` into milliseconds.
 * Returns null when the string is not a duration.
 */
export function parseDuration(input: string): number | null {
  const value = input.trim();
  if (!DURATION_PATTERN.test(value)) {
    return null;
  }

  let total = 0;
  for (const [, amount, unit] of value.matchAll(DURATION_PART)) {
    total += Number(amount) * (DURATION_UNITS[unit ?? ''] ?? 0);
  }
  return Math.round(total);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
