import type { AnnotationStrategy } from "./strategy.js";

export interface Summary {
  summary: string;
  /** Indices of the emitted sentences, ascending. */
  sentenceIndices: number[];
  /** True when the input had no more sentences than requested and was returned as-is. */
  shortCircuited: boolean;
}

export interface Summarizer {
  summarize(text: string, strategy: AnnotationStrategy, maxSentences: number): Summary;
}
