import type { TokenizeOptions, Tokenizer, WordToken } from "../tokenizer.js";

const WORD = /[\p{L}\p{N}]+/gu;

/**
 * Unicode-aware word tokenizer:
 * - splits on anything that is not a letter or digit
 * - optionally lowercases
 * - optionally removes stop words and short terms
 * - yields token positions (word index)
 */
export class WordTokenizer implements Tokenizer {
  constructor(private readonly stopWords: ReadonlySet<string> = new Set()) {}

  *tokenize(text: string, options?: TokenizeOptions): Iterable<WordToken> {
    const normalizeCase = options?.normalizeCase ?? true;
    const removeStopWords = options?.removeStopWords ?? false;
    const minLength = options?.minLength ?? 1;

    let position = 0;
    for (const match of text.matchAll(WORD)) {
      const term = normalizeCase ? match[0].toLowerCase() : match[0];
      const keep = term.length >= minLength && (!removeStopWords || !this.stopWords.has(term.toLowerCase()));
      if (keep) yield { term, position };
      position++;
    }
  }
}

/** Splits on runs of whitespace, dropping empty pieces. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/** Drops every word equal (case-insensitively) to the word right before it in the source. */
export function suppressAdjacentRepeats(words: readonly string[]): string[] {
  const out: string[] = [];
  let previous: string | undefined;
  for (const w of words) {
    const lower = w.toLowerCase();
    if (lower !== previous) out.push(w);
    previous = lower;
  }
  return out;
}
