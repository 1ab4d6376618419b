export * from "./core/types.js";
export type { AnnotationResult, Annotator } from "./core/annotator.js";
export type { Corrector } from "./core/corrector.js";
export type { Comparator, Heap, TopKSelector } from "./core/heap.js";
export type { KeywordCount, KeywordExtractor, Keywords } from "./core/keywords.js";
export type { Lexicon } from "./core/lexicon.js";
export type { PatternFinder, PatternMatches } from "./core/patterns.js";
export type { ScoreOptions, SentenceFeatures, SentenceScorer } from "./core/scorer.js";
export type { AnnotationStrategy, ScorableSentence } from "./core/strategy.js";
export type { Summarizer, Summary } from "./core/summarizer.js";
export type { TokenizeOptions, Tokenizer, WordToken } from "./core/tokenizer.js";
export * from "./core/errors.js";
export * from "./core/impl/index.js";
export { createEngine } from "./http/engine.js";
export { createServer, startServer, type ServerOptions } from "./http/server.js";
export { loadConfig, type AppConfig } from "./config.js";
