import type { SentenceScorer } from "../scorer.js";
import type { AnnotationStrategy, ScorableSentence } from "../strategy.js";
import type { Capability } from "../types.js";
import { splitWords, suppressAdjacentRepeats } from "./wordTokenizer.js";

/** Words longer than this count as content words when no tagger is available. */
const CONTENT_WORD_MIN_LENGTH = 3;

/**
 * Text-only path used when the annotator is unavailable.
 *
 * Deliberately cruder than the annotated path:
 * - sentences are the non-empty fragments between periods (periods are dropped)
 * - "nouns" are whitespace-delimited words of three or more characters
 * - correction is repeat suppression only
 */
export class HeuristicStrategy implements AnnotationStrategy {
  readonly mode = "heuristic";
  readonly unavailable: readonly Capability[] = ["lemmatization", "contextual-corrections", "part-of-speech"];

  constructor(
    private readonly text: string,
    private readonly scorer: SentenceScorer,
  ) {}

  tokenizeSentences(): readonly ScorableSentence[] {
    return this.text
      .split(".")
      .map((fragment) => fragment.trim())
      .filter((fragment) => fragment.length > 0)
      .map((fragment, index) => ({
        index,
        text: fragment,
        nounCount: splitWords(fragment).filter((w) => w.length >= CONTENT_WORD_MIN_LENGTH).length,
      }));
  }

  scoreSentence(sentence: ScorableSentence): number {
    return this.scorer.score({ index: sentence.index, nounCount: sentence.nounCount, length: sentence.text.length });
  }

  correct(): string {
    return suppressAdjacentRepeats(splitWords(this.text)).join(" ");
  }

  lemmatize(): null {
    return null;
  }

  wordsTagged(): string[] {
    return [];
  }
}
