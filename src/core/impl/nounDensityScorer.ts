import type { ScoreOptions, SentenceFeatures, SentenceScorer } from "../scorer.js";

/**
 * nouns - length / lengthDivisor + (first sentence ? leadBonus : 0)
 *
 * Nouns stand in for topical content; the length penalty keeps long
 * run-on sentences from winning on noun count alone.
 */
export class NounDensityScorer implements SentenceScorer {
  private readonly lengthDivisor: number;
  private readonly leadBonus: number;

  constructor(options: ScoreOptions = {}) {
    this.lengthDivisor = options.lengthDivisor ?? 200;
    this.leadBonus = options.leadBonus ?? 1;
  }

  score(features: SentenceFeatures): number {
    const lead = features.index === 0 ? this.leadBonus : 0;
    return features.nounCount - features.length / this.lengthDivisor + lead;
  }
}
