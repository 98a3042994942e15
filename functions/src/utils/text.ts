const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  '#39': "'",
  hellip: '…',
  rsquo: '’',
  lsquo: '‘',
  ldquo: '“',
  rdquo: '”',
};

export function decodeEntities(value: string): string {
  return value
    .replace(/&#(\d+);/g, (match, code: string) => fromCodePoint(Number.parseInt(code, 10)) ?? match)
    .replace(/&#x([0-9a-f]+);/gi, (match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)) ?? match)
    .replace(/&([a-z0-9#]+);/gi, (match, name: string) => ENTITIES[name.toLowerCase()] ?? match);
}

function fromCodePoint(code: number): string | null {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) {
    return null;
  }
  return String.fromCodePoint(code);
}

/** Flattens an HTML fragment into plain text on a single line. */
export function stripHtml(value: string): string {
  const withoutTags = value
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/<[^>]+>/g, ' ');
  return decodeEntities(withoutTags).replace(/\s+/g, ' ').trim();
}

export function cleanText(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const cleaned = stripHtml(value);
  return cleaned.length > 0 ? cleaned : null;
}

export function containsIgnoreCase(haystack: string | null | undefined, needle: string): boolean {
  if (!haystack) {
    return false;
  }
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function equalsIgnoreCase(a: string | null | undefined, b: string | null | undefined): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return false;
  }
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
