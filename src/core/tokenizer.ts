export interface WordToken {
  term: string;
  /** 0-based position among the words of the source text. */
  position: number;
}

export interface TokenizeOptions {
  /** If true, lowercase terms. */
  normalizeCase?: boolean;
  /** If true, drop terms found in the stopword set. */
  removeStopWords?: boolean;
  /** Drop terms shorter than this many characters. */
  minLength?: number;
}

/**
 * Turns text into a stream of word tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - positions count dropped terms too
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<WordToken>;
}
