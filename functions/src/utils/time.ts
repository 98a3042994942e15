const HOUR_MS = 60 * 60 * 1000;

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * HOUR_MS);
}

/**
 * Parses an ISO-8601 timestamp. A trailing "Z" marks UTC; a value without any
 * offset is read as UTC as well.
 */
export function parseIsoUtc(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }
  const trimmed = value.trim();
  const hasZone = /([zZ]|[+-]\d{2}:?\d{2})$/.test(trimmed);
  const candidate = hasZone || !trimmed.includes('T') ? trimmed : `${trimmed}Z`;
  const parsed = new Date(candidate);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/** Month index (0-11) from "Oct", "October", "oct." or "10". */
export function parseMonth(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1 && value <= 12 ? value - 1 : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim().toLowerCase().replace(/\.$/, '');
  if (/^\d{1,2}$/.test(trimmed)) {
    return parseMonth(Number.parseInt(trimmed, 10));
  }
  if (trimmed.length < 3) {
    return null;
  }
  const index = MONTHS.findIndex(month => month.startsWith(trimmed));
  return index >= 0 ? index : null;
}
