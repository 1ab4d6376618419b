import type { TopKSelector } from "../heap.js";
import type { AnnotationStrategy } from "../strategy.js";
import type { Summarizer, Summary } from "../summarizer.js";
import type { ScoredSentence } from "../types.js";
import { assertMaxSentences } from "../errors.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

/** Higher score first; equal scores keep reading order. */
function byScoreThenPosition(a: ScoredSentence, b: ScoredSentence): number {
  return b.score - a.score || a.sentenceIndex - b.sentenceIndex;
}

/**
 * Picks the best `maxSentences` sentences and emits them in reading order.
 * Inputs that already fit are returned verbatim.
 */
export class ExtractiveSummarizer implements Summarizer {
  constructor(private readonly selector: TopKSelector<ScoredSentence> = new MinHeapTopKSelector()) {}

  summarize(text: string, strategy: AnnotationStrategy, maxSentences: number): Summary {
    assertMaxSentences(maxSentences);

    const sentences = strategy.tokenizeSentences();
    if (sentences.length <= maxSentences) {
      return { summary: text, sentenceIndices: sentences.map((s) => s.index), shortCircuited: true };
    }

    const scored = sentences.map((s) => ({ sentenceIndex: s.index, score: strategy.scoreSentence(s) }));
    const best = this.selector.topK(scored, maxSentences, byScoreThenPosition);

    const chosen = new Set(best.map((s) => s.sentenceIndex));
    const kept = sentences.filter((s) => chosen.has(s.index)).sort((a, b) => a.index - b.index);

    return {
      summary: kept.map((s) => s.text.trim()).join(" "),
      sentenceIndices: kept.map((s) => s.index),
      shortCircuited: false,
    };
  }
}
