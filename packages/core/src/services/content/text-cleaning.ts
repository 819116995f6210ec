const NON_CONTENT_BLOCKS = /<(script|style|head|header|footer|nav|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const TAGS = /<[^>]*>/g;
const BOILERPLATE = /\b(?:login|subscribe|e-?paper|account)\b|\bimage \d+:/gi;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(?:#(\d+)|#x([0-9a-f]+)|([a-z]+));/gi, (match, dec?: string, hex?: string, name?: string) => {
    if (name !== undefined) {
      return NAMED_ENTITIES[name.toLowerCase()] ?? match;
    }
    const codePoint = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? '', 16);
    if (!Number.isFinite(codePoint) || codePoint < 1 || codePoint > 0x10ffff) {
      return match;
    }
    return String.fromCodePoint(codePoint);
  });
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Strips markup, entities and site chrome from a provider snippet. */
export function cleanText(text: string): string {
  const withoutMarkup = text.replace(NON_CONTENT_BLOCKS, ' ').replace(TAGS, ' ');
  return collapseWhitespace(decodeEntities(withoutMarkup).replace(BOILERPLATE, ' '));
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const cut = text.slice(0, Math.max(0, maxChars - 3));
  const lastSpace = cut.lastIndexOf(' ');
  const base = lastSpace > maxChars / 2 ? cut.slice(0, lastSpace) : cut;
  return `${base.trimEnd()}...`;
}
