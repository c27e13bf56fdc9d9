/**
 * Quire — Text Normalization
 *
 * Titles and summaries from both feed schemas go through cleanText():
 * HTML entity decoding first, then whitespace normalization.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  copy: '©',
  reg: '®',
  trade: '™',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  lsquo: '‘',
  rsquo: '’',
  sbquo: '‚',
  ldquo: '“',
  rdquo: '”',
  bdquo: '„',
  laquo: '«',
  raquo: '»',
  bull: '•',
  middot: '·',
  deg: '°',
  times: '×',
  divide: '÷',
  euro: '€',
  pound: '£',
  yen: '¥',
  cent: '¢',
  sect: '§',
  para: '¶',
  iexcl: '¡',
  iquest: '¿',
  eacute: 'é',
  egrave: 'è',
  agrave: 'à',
  ccedil: 'ç',
  uuml: 'ü',
  ouml: 'ö',
  auml: 'ä',
  szlig: 'ß',
  ntilde: 'ñ',
};

const ENTITY_PATTERN = /&(?:#(\d{1,7})|#[xX]([0-9a-fA-F]{1,6})|([a-zA-Z][a-zA-Z0-9]{1,31}));/g;

function fromCodePoint(codePoint: number): string | undefined {
  if (codePoint === 0 || codePoint > 0x10ffff) return undefined;
  // Lone surrogates are not characters
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return undefined;
  return String.fromCodePoint(codePoint);
}

/**
 * Decode named, decimal and hex character references in a single pass.
 * Unknown or invalid references are left untouched, so `&amp;lt;`
 * becomes `&lt;`, not `<`.
 */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes('&')) return text;

  return text.replace(
    ENTITY_PATTERN,
    (match, decimal: string | undefined, hex: string | undefined, name: string | undefined) => {
      if (decimal !== undefined) {
        return fromCodePoint(parseInt(decimal, 10)) ?? match;
      }
      if (hex !== undefined) {
        return fromCodePoint(parseInt(hex, 16)) ?? match;
      }
      if (name !== undefined && Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, name)) {
        return NAMED_ENTITIES[name];
      }
      return match;
    }
  );
}

/**
 * Collapse every whitespace run (newlines, tabs, nbsp included) to one
 * space and trim. Idempotent.
 */
export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

export function cleanText(text: string): string {
  return normalizeWhitespace(decodeHtmlEntities(text));
}
