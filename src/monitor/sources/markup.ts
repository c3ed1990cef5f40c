export const MIN_TEXT_CHARS = 20;
export const MAX_TEXT_CHARS = 1000;

export function firstMatch(text: string, re: RegExp): string | null {
  const m = re.exec(text);
  return m?.[1]?.trim() ?? null;
}

/** Body of a CDATA section, or null when `s` is not one. */
export function cdataBody(s: string): string | null {
  const m = /^<!\[CDATA\[([\s\S]*?)\]\]>$/.exec(s.trim());
  return m ? (m[1] ?? "") : null;
}

const MAX_CODE_POINT = 0x10ffff;

function fromCodePointOr(ref: string, n: number): string {
  return Number.isSafeInteger(n) && n <= MAX_CODE_POINT ? String.fromCodePoint(n) : ref;
}

/** One layer of entity decoding. Out-of-range numeric references stay as written. */
export function decodeEntities(s: string): string {
  return s
    .replace(/&#(\d+);/g, (ref: string, code: string) => fromCodePointOr(ref, Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (ref: string, code: string) => fromCodePointOr(ref, parseInt(code, 16)))
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&");
}

// A tag opens with a name, "/" or "!"; a bare "<" in prose is not one.
export function stripTags(s: string): string {
  return s.replace(/<[A-Za-z\/!][^>]*>/g, "");
}

/** Raw HTML to plain text: strip tags, then decode entities once. */
export function htmlToText(html: string): string {
  return decodeEntities(stripTags(html))
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Text of a feed element. CDATA holds raw HTML; anything else is HTML
 * escaped once more for XML, so that layer is decoded first.
 */
export function feedText(s: string): string {
  return htmlToText(cdataBody(s) ?? decodeEntities(s));
}

/** Lengths count code points, so astral characters are never split. */
export function clampText(s: string, max = MAX_TEXT_CHARS): string {
  const chars = Array.from(s);
  return chars.length > max ? chars.slice(0, max).join("") : s;
}

export function isUsableText(s: string): boolean {
  return Array.from(s).length > MIN_TEXT_CHARS;
}

/** Split a document into chunks starting at each opening `<tag`. */
export function splitElements(xml: string, tag: string): string[] {
  const re = new RegExp(`<${tag}\\b`, "i");
  return xml
    .split(re)
    .slice(1)
    .map((chunk) => `<${tag}${chunk}`);
}
