import type { Corrector } from "../corrector.js";
import type { SentenceScorer } from "../scorer.js";
import type { AnnotationStrategy, ScorableSentence } from "../strategy.js";
import type { Capability, Document, Token } from "../types.js";

export interface StrategyDeps {
  corrector: Corrector;
  scorer: SentenceScorer;
}

/** Annotator-backed path: real sentences, tags and lemmas. */
export class FullAnnotationStrategy implements AnnotationStrategy {
  readonly mode = "full";
  readonly unavailable: readonly Capability[] = [];

  private readonly tokens: readonly Token[];

  constructor(
    private readonly document: Document,
    private readonly deps: StrategyDeps,
  ) {
    // corrections look across sentence boundaries, like a plain token stream
    this.tokens = document.sentences.flatMap((s) => s.tokens);
  }

  tokenizeSentences(): readonly ScorableSentence[] {
    return this.document.sentences.map((s) => ({
      index: s.index,
      text: s.text,
      nounCount: s.tokens.filter((t) => t.pos === "noun").length,
    }));
  }

  scoreSentence(sentence: ScorableSentence): number {
    return this.deps.scorer.score({ index: sentence.index, nounCount: sentence.nounCount, length: sentence.text.length });
  }

  correct(): string {
    return this.deps.corrector.correct(this.tokens);
  }

  lemmatize(): string {
    return this.tokens.map((t) => t.lemma).join(" ");
  }

  wordsTagged(pos: "noun" | "verb"): string[] {
    return this.tokens.filter((t) => t.pos === pos).map((t) => t.text);
  }
}
