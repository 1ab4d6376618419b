import type { AnnotationMode, Capability } from "./types.js";

/** A sentence as seen by the summarizer, whichever path produced it. */
export interface ScorableSentence {
  index: number;
  text: string;
  nounCount: number;
}

/**
 * One implementation per annotation path, chosen once per call.
 * Callers never branch on annotator availability themselves.
 */
export interface AnnotationStrategy {
  readonly mode: AnnotationMode;
  readonly unavailable: readonly Capability[];

  tokenizeSentences(): readonly ScorableSentence[];
  scoreSentence(sentence: ScorableSentence): number;
  /** Corrected text for the whole input. */
  correct(): string;
  /** Lemmas joined by spaces, or null when the path has none. */
  lemmatize(): string | null;
  /** Surface forms of the tokens tagged `pos`, in reading order. */
  wordsTagged(pos: "noun" | "verb"): string[];
}
