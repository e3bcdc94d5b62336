/**
 * Word tokenizer
 *
 * Whitespace-delimited words with surrounding punctuation split off as
 * separate tokens and English clitics ("n't", "'s", "'ll", ...) detached
 * from their host word.
 */

const WORD_CHAR = /[\p{L}\p{N}]/u;
const CLITIC = /^(.+?)(n't|'s|'re|'ve|'ll|'d|'m)$/i;

export type Tokenizer = (text: string) => string[];

export const tokenizeWords: Tokenizer = (text) => {
  const tokens: string[] = [];

  for (const chunk of text.split(/\s+/)) {
    if (!chunk) continue;

    const chars = Array.from(chunk);
    let start = 0;
    let end = chars.length;

    while (start < end && !WORD_CHAR.test(chars[start] ?? '')) start++;
    if (start === end) {
      // Pure punctuation stays together
      tokens.push(chunk);
      continue;
    }
    while (end > start && !WORD_CHAR.test(chars[end - 1] ?? '')) end--;

    tokens.push(...chars.slice(0, start));
    tokens.push(...splitClitic(chars.slice(start, end).join('')));
    tokens.push(...chars.slice(end));
  }

  return tokens;
};

function splitClitic(word: string): string[] {
  const match = CLITIC.exec(word);
  if (!match || !match[1] || !match[2]) {
    return [word];
  }
  return [match[1], match[2]];
}
