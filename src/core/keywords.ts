import type { AnnotationStrategy } from "./strategy.js";

export interface KeywordCount {
  term: string;
  count: number;
}

export interface Keywords {
  /** Most frequent content words, stopwords removed. */
  topWords: KeywordCount[];
  /** Empty when part-of-speech tags are unavailable. */
  nouns: KeywordCount[];
  verbs: KeywordCount[];
}

export interface KeywordExtractor {
  extract(text: string, strategy: AnnotationStrategy): Keywords;
}
