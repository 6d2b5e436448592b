const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

const SEGMENT_RE = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parses a duration string such as `30s`, `1m30s`, `1.5h` or `250ms`
 * into milliseconds.
 *
 * Returns `null` for anything that is not a well-formed, positive
 * duration, and for durations longer than `MAX_DURATION_MS`.
 */
export function parseDuration(input: string): number | null {
  const text = input.trim();
  if (text === '') return null;

  let total = 0;
  SEGMENT_RE.lastIndex = 0;

  while (SEGMENT_RE.lastIndex < text.length) {
    const match = SEGMENT_RE.exec(text);
    if (match === null) return null;

    const amount = Number(match[1]);
    const unit = UNIT_MS[match[2] ?? ''];
    if (!Number.isFinite(amount) || unit === undefined) return null;

    total += amount * unit;
  }

  return total > 0 && total <= MAX_DURATION_MS ? total : null;
}
