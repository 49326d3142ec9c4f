const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000
};

/**
 * Parse duration strings into milliseconds
 * Supports formats like: 250ms, 30s, 5m, 2h, 1d, or a bare number of milliseconds
 */
export function parseDurationMs(duration: string): number {
  const trimmed = duration.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  // Match number followed by unit
  const match = trimmed.match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use formats like 250ms, 30s, 5m, 2h, 1d`);
  }

  const [, value, unit] = match;
  return Math.round(parseFloat(value) * UNIT_MS[unit]);
}

/**
 * Format a Date for display
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ') + ' UTC';
}
