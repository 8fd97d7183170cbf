// Shared by the hygiene rules and the fix helpers in the session layer.

// zero-width, bidi marks/embeddings, line/paragraph separators, BOM, soft hyphen
export const INVISIBLE_RE = /[\u200B\u200C\u200D\u200E\u200F\u2028\u2029\u202A-\u202E\uFEFF\u00AD]/g;

export const UNICODE_SUSPECTS: Readonly<Record<string, string>> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201C': '"',
  '\u201D': '"',
  '\u2013': '-',
  '\u2014': '-',
  '\u00A0': ' ',
};

const MULTI_SPACE_RE = / {2,}/g;

export function hasInvisible(s: string): boolean {
  return s.search(INVISIBLE_RE) !== -1;
}

export function stripInvisible(s: string): string {
  return s.replace(INVISIBLE_RE, '');
}

export function unicodeSuspects(s: string): string[] {
  return [...new Set([...s].filter((ch) => ch in UNICODE_SUSPECTS))];
}

export function asciiPunctuation(s: string): string {
  let out = '';
  for (const ch of s) out += UNICODE_SUSPECTS[ch] ?? ch;
  return out;
}

export function collapseSpaces(s: string): string {
  return s.replace(MULTI_SPACE_RE, ' ').trim();
}

export function hasMultipleSpaces(s: string): boolean {
  return s.includes('  ');
}

export function joinLines(s: string): string {
  return s.replace(/\r\n|\r|\n/g, ' ').trim();
}

export function toTitleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, pre: string, ch: string) => pre + ch.toUpperCase());
}

export const hasLetter = (s: string) => /\p{L}/u.test(s);

export function codePointLabel(ch: string): string {
  return `U+${(ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`;
}
