/** Shared core types used by module contracts. */

/** Closed part-of-speech set; annotator tags outside it collapse to "other". */
export type PartOfSpeech = "noun" | "verb" | "determiner" | "other";

/** A token produced by an annotator. */
export interface Token {
  text: string;
  /** Dictionary form; equals `text` when lemmatization is not meaningful. */
  lemma: string;
  pos: PartOfSpeech;
  /** 0-based position within the owning sentence. */
  index: number;
}

export interface Sentence {
  tokens: readonly Token[];
  text: string;
  /** 0-based position within the document. */
  index: number;
}

export interface Document {
  sentences: readonly Sentence[];
}

export interface ScoredSentence {
  sentenceIndex: number;
  score: number;
}

/** Which path produced a result: annotator-backed or the text-only fallback. */
export type AnnotationMode = "full" | "heuristic";

/** Features the heuristic path cannot provide. */
export type Capability = "lemmatization" | "contextual-corrections" | "part-of-speech";
