// Text helpers shared by the generators.

export interface Token {
  text:  string;   // lowercased
  start: number;   // offset in the original text
  end:   number;
}

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word, case-insensitive pattern. `\b` is ASCII-only, so word edges
 *  are expressed with Unicode letter/number lookarounds (Cyrillic, Polish). */
export function wordPattern(phrase: string): RegExp {
  const body = escapeRegex(phrase.trim()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, "iu");
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const m of text.matchAll(TOKEN_RE)) {
    const start = m.index ?? 0;
    tokens.push({ text: m[0].toLowerCase(), start, end: start + m[0].length });
  }
  return tokens;
}

/** Lowercase, punctuation → space, collapsed whitespace. */
export function normalizeName(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Title and body joined the way every generator sees an article. */
export function articleText(title: string, body: string): string {
  return `${title}\n${body}`.trim();
}
