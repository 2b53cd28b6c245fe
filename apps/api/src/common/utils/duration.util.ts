// src/common/utils/duration.util.ts

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parse a duration string such as `15m`, `168h`, `1h30m` or `1.5s` into milliseconds.
 * A bare `0` is accepted; any other unitless number is rejected.
 * @throws Error when the string is empty or malformed
 */
export function parseDuration(input: string): number {
  const raw = input.trim();
  if (raw === '0') return 0;
  if (raw.length === 0) throw new Error(`invalid duration "${input}"`);

  SEGMENT.lastIndex = 0;
  let total = 0;
  while (SEGMENT.lastIndex < raw.length) {
    const match = SEGMENT.exec(raw);
    if (!match) throw new Error(`invalid duration "${input}"`);
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.floor(total);
}

/** Whole seconds of a millisecond span, truncated. */
export const toSeconds = (ms: number): number => Math.floor(ms / 1000);
