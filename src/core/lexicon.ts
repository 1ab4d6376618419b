/**
 * Read-only lexical resources, loaded once per process.
 * Keys are lowercase.
 */
export interface Lexicon {
  /** misspelling -> replacement */
  readonly corrections: ReadonlyMap<string, string>;
  /** noun lemma -> article-qualified phrase, used to resolve "lo" */
  readonly genderedNouns: ReadonlyMap<string, string>;
  readonly stopwords: ReadonlySet<string>;
  readonly version: string;
}
