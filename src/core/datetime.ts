const RELATIVE_UNITS: Array<[RegExp, number]> = [
  [/^(s|sec|secs|second|seconds)$/, 1],
  [/^(m|min|mins|minute|minutes)$/, 60],
  [/^(h|hr|hrs|hour|hours)$/, 3600],
  [/^(d|day|days)$/, 86400],
  [/^(w|wk|wks|week|weeks)$/, 604800],
  [/^(y|yr|yrs|year|years)$/, 31536000],
];

const RELATIVE_PATTERN = /\b(\d+)\s*(s|secs?|seconds?|m|mins?|minutes?|h|hrs?|hours?|d|days?|w|wks?|weeks?|y|yrs?|years?)\b/;

/**
 * Best-effort conversion of feed timestamps to Unix seconds (UTC).
 *
 * Accepts epoch seconds or milliseconds, ISO and RFC dates, relative forms
 * such as "3 h" or "2 days ago", and "now"/"just now". Returns null when
 * nothing matches.
 */
export function parseTimestamp(raw: unknown, now: number = Date.now()): number | null {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw <= 0) return null;
    return raw > 10_000_000_000 ? Math.floor(raw / 1000) : Math.floor(raw);
  }
  if (typeof raw !== 'string') return null;

  const text = raw.trim().toLowerCase();
  if (!text) return null;

  if (text === 'now' || text === 'just now') {
    return Math.floor(now / 1000);
  }

  if (/^\d{9,13}$/.test(text)) {
    return parseTimestamp(Number(text), now);
  }

  const relative = text.match(RELATIVE_PATTERN);
  if (relative) {
    const amount = Number(relative[1]);
    const unit = relative[2];
    const entry = RELATIVE_UNITS.find(([pattern]) => pattern.test(unit));
    if (entry) {
      return Math.floor(now / 1000) - amount * entry[1];
    }
  }

  const parsed = Date.parse(raw.trim());
  if (!Number.isNaN(parsed)) {
    return Math.floor(parsed / 1000);
  }

  return null;
}
