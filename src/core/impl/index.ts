export { TextEngine, type BatchItem, type EngineDeps, type KeywordResult, type NormalizeResult, type SummaryResult } from "./textEngine.js";
export { RuleCorrector } from "./ruleCorrector.js";
export { NounDensityScorer } from "./nounDensityScorer.js";
export { ExtractiveSummarizer } from "./extractiveSummarizer.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { FullAnnotationStrategy, type StrategyDeps } from "./fullAnnotationStrategy.js";
export { HeuristicStrategy } from "./heuristicStrategy.js";
export { FrequencyKeywordExtractor, mostCommon, type KeywordOptions } from "./frequencyKeywordExtractor.js";
export { RegexPatternFinder } from "./regexPatternFinder.js";
export { WordTokenizer, splitWords, suppressAdjacentRepeats } from "./wordTokenizer.js";
export { HttpAnnotator, mapTag, type HttpAnnotatorOptions } from "./httpAnnotator.js";
export { StaticAnnotator } from "./staticAnnotator.js";
export { assertWellFormed } from "./documentGuard.js";
export { DEFAULT_LEXICON_DIR, createLexicon, loadLexicon, readTable, readWordList, type LexiconSource, type LexiconTable, type WordList } from "./jsonLexicon.js";
