const SUFFIXES: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

// "1,234" -> 1234, "1.2K" -> 1200, "3M" -> 3000000
export function parseCount(text: string): number | null {
  const match = text.replace(/\s+/g, '').match(/^(\d+(?:[.,]\d+)*)([KkMmBb])?$/);
  if (!match) return null;

  const [, digits, suffix] = match;
  if (suffix) {
    const value = parseFloat(digits.replace(',', '.'));
    if (Number.isNaN(value)) return null;
    return Math.round(value * SUFFIXES[suffix.toUpperCase()]);
  }

  const value = parseInt(digits.replace(/[.,]/g, ''), 10);
  return Number.isNaN(value) ? null : value;
}

// Finds "<count> <label>" inside free text, e.g. "1.2K reactions" or "34 comments"
export function countBeforeLabel(text: string, labels: string[]): number | null {
  for (const label of labels) {
    const pattern = new RegExp(`(\\d+(?:[.,]\\d+)*\\s?[KkMmBb]?)\\s+${label}\\b`, 'i');
    const match = text.match(pattern);
    if (match) {
      const value = parseCount(match[1]);
      if (value !== null) return value;
    }
  }
  return null;
}

export function toCount(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}
