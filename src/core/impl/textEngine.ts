import type { AnnotationResult, Annotator } from "../annotator.js";
import type { Corrector } from "../corrector.js";
import type { KeywordExtractor, Keywords } from "../keywords.js";
import type { Lexicon } from "../lexicon.js";
import type { PatternFinder, PatternMatches } from "../patterns.js";
import type { SentenceScorer } from "../scorer.js";
import type { AnnotationStrategy } from "../strategy.js";
import type { Summarizer } from "../summarizer.js";
import type { AnnotationMode, Capability } from "../types.js";
import { assertMaxSentences, assertNotEmpty } from "../errors.js";
import { logger as rootLogger, type Logger } from "../../logger.js";
import { assertWellFormed } from "./documentGuard.js";
import { ExtractiveSummarizer } from "./extractiveSummarizer.js";
import { FrequencyKeywordExtractor } from "./frequencyKeywordExtractor.js";
import { FullAnnotationStrategy } from "./fullAnnotationStrategy.js";
import { HeuristicStrategy } from "./heuristicStrategy.js";
import { NounDensityScorer } from "./nounDensityScorer.js";
import { RegexPatternFinder } from "./regexPatternFinder.js";
import { RuleCorrector } from "./ruleCorrector.js";
import { WordTokenizer, splitWords, suppressAdjacentRepeats } from "./wordTokenizer.js";

export interface NormalizeResult {
  original: string;
  /** null when no annotator was available */
  lemmatized: string | null;
  /** whitespace words with adjacent repeats removed */
  deduplicated: string;
  corrected: string;
  mode: AnnotationMode;
  unavailable: readonly Capability[];
}

/** One entry per input document; a failed document does not affect the others. */
export type BatchItem = { status: "ok"; result: NormalizeResult } | { status: "error"; error: Error };

export interface SummaryResult {
  summary: string;
  sentenceIndices: number[];
  shortCircuited: boolean;
  mode: AnnotationMode;
}

export interface KeywordResult extends Keywords {
  mode: AnnotationMode;
}

export interface EngineDeps {
  lexicon: Lexicon;
  /** omitted: every call takes the heuristic path */
  annotator?: Annotator;
  /** deadline around each annotator call; a miss counts as unavailable */
  annotatorTimeoutMs?: number;
  corrector?: Corrector;
  scorer?: SentenceScorer;
  summarizer?: Summarizer;
  keywords?: KeywordExtractor;
  patterns?: PatternFinder;
  logger?: Logger;
}

/**
 * Entry point for normalization, summarization and keyword extraction.
 *
 * Each call validates its input, asks the annotator once, and runs on the
 * strategy that answer selects. Holds no per-call state, so calls may overlap.
 */
export class TextEngine {
  private readonly annotator: Annotator | undefined;
  private readonly annotatorTimeoutMs: number;
  private readonly corrector: Corrector;
  private readonly scorer: SentenceScorer;
  private readonly summarizer: Summarizer;
  private readonly keywordExtractor: KeywordExtractor;
  private readonly patternFinder: PatternFinder;
  private readonly log: Logger;

  constructor(deps: EngineDeps) {
    this.annotator = deps.annotator;
    this.annotatorTimeoutMs = deps.annotatorTimeoutMs ?? 5000;
    this.corrector = deps.corrector ?? new RuleCorrector(deps.lexicon);
    this.scorer = deps.scorer ?? new NounDensityScorer();
    this.summarizer = deps.summarizer ?? new ExtractiveSummarizer();
    this.keywordExtractor = deps.keywords ?? new FrequencyKeywordExtractor(new WordTokenizer(deps.lexicon.stopwords));
    this.patternFinder = deps.patterns ?? new RegexPatternFinder();
    this.log = (deps.logger ?? rootLogger).child({ component: "textEngine" });
  }

  get hasAnnotator(): boolean {
    return this.annotator !== undefined;
  }

  async normalize(text: string): Promise<NormalizeResult> {
    assertNotEmpty(text);
    const strategy = await this.strategyFor(text);

    return {
      original: text,
      lemmatized: strategy.lemmatize(),
      deduplicated: suppressAdjacentRepeats(splitWords(text)).join(" "),
      corrected: strategy.correct(),
      mode: strategy.mode,
      unavailable: strategy.unavailable,
    };
  }

  /** Documents are independent; they are annotated and corrected concurrently. Results keep input order. */
  async normalizeMany(texts: readonly string[]): Promise<BatchItem[]> {
    const settled = await Promise.allSettled(texts.map((t) => this.normalize(t)));
    return settled.map((outcome): BatchItem => {
      if (outcome.status === "fulfilled") return { status: "ok", result: outcome.value };
      const reason: unknown = outcome.reason;
      return { status: "error", error: reason instanceof Error ? reason : new Error(String(reason)) };
    });
  }

  async summarize(text: string, maxSentences: number): Promise<SummaryResult> {
    assertNotEmpty(text);
    assertMaxSentences(maxSentences);
    const strategy = await this.strategyFor(text);

    const summary = this.summarizer.summarize(text, strategy, maxSentences);
    return { ...summary, mode: strategy.mode };
  }

  async keywords(text: string): Promise<KeywordResult> {
    assertNotEmpty(text);
    const strategy = await this.strategyFor(text);

    return { ...this.keywordExtractor.extract(text, strategy), mode: strategy.mode };
  }

  patterns(text: string): PatternMatches {
    assertNotEmpty(text);
    return this.patternFinder.find(text);
  }

  private async strategyFor(text: string): Promise<AnnotationStrategy> {
    const result = await this.annotate(text);
    if (result.status === "unavailable") {
      this.log.warn({ reason: result.reason }, "annotator unavailable; using heuristic fallback");
      return new HeuristicStrategy(text, this.scorer);
    }

    assertWellFormed(result.document);
    return new FullAnnotationStrategy(result.document, { corrector: this.corrector, scorer: this.scorer });
  }

  private async annotate(text: string): Promise<AnnotationResult> {
    if (!this.annotator) return { status: "unavailable", reason: "no annotator configured" };

    const ms = this.annotatorTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<AnnotationResult>((resolve) => {
      timer = setTimeout(() => resolve({ status: "unavailable", reason: `annotator timed out after ${ms}ms` }), ms);
    });

    try {
      return await Promise.race([this.annotator.annotate(text), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
