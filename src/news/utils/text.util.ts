const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;
// a letter from any script other than Latin (CJK, Hangul, Kana, Cyrillic, ...)
const NON_LATIN_LETTER_RE = /(?=\p{L})[^\p{Script=Latin}]/u;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(/&#x([0-9a-f]+);/gi, (match, hex: string) =>
      fromCodePoint(parseInt(hex, 16), match),
    )
    .replace(/&#(\d+);/g, (match, dec: string) =>
      fromCodePoint(parseInt(dec, 10), match),
    )
    .replace(
      /&(amp|lt|gt|quot|#39|apos|nbsp);/g,
      (match) => ENTITY_MAP[match] ?? match,
    );
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/gi, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  const decoded = decodeHtmlEntities(stripCdata(value));
  // feed descriptions carry escaped HTML whose own entities are escaped again (&amp;nbsp;)
  const text = decodeHtmlEntities(decoded.replace(TAG_RE, ' '));
  return text.replace(WS_RE, ' ').trim();
}

/** Drops a trailing " - Publisher" that aggregators append to titles. */
export function stripSourceSuffix(title: string, sourceName?: string): string {
  const normalized = cleanText(title);
  const source = cleanText(sourceName ?? '');
  if (!normalized || !source) {
    return normalized;
  }
  const escaped = source.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const stripped = normalized
    .replace(new RegExp(`\\s+[-–—|]\\s+${escaped}$`, 'i'), '')
    .trim();
  return stripped || normalized;
}

export function hasNonLatinScript(value: string): boolean {
  return NON_LATIN_LETTER_RE.test(value);
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./i, '');
  } catch {
    return '';
  }
}

export function truncate(value: string, maxChars: number): string {
  return value.length > maxChars ? value.slice(0, maxChars).trim() : value;
}

function fromCodePoint(codePoint: number, fallback: string): string {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return fallback;
  }
  return String.fromCodePoint(codePoint);
}
