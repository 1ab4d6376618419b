export interface SentenceFeatures {
  /** 0-based position within the document. */
  index: number;
  nounCount: number;
  /** length in characters */
  length: number;
}

export interface ScoreOptions {
  /** Characters per point of length penalty. */
  lengthDivisor?: number;
  /** Bonus added to the first sentence. */
  leadBonus?: number;
}

/** Relevance of one sentence; higher is more relevant. */
export interface SentenceScorer {
  score(features: SentenceFeatures): number;
}
