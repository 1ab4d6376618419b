import type { KeywordCount, KeywordExtractor, Keywords } from "../keywords.js";
import type { AnnotationStrategy } from "../strategy.js";
import type { Tokenizer } from "../tokenizer.js";

export interface KeywordOptions {
  /** entries per list */
  limit?: number;
  minWordLength?: number;
}

/** Counts in first-seen order, sorted by count; stable sort keeps first-seen order for ties. */
export function mostCommon(terms: Iterable<string>, limit: number): KeywordCount[] {
  const counts = new Map<string, number>();
  for (const term of terms) counts.set(term, (counts.get(term) ?? 0) + 1);

  return Array.from(counts, ([term, count]) => ({ term, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export class FrequencyKeywordExtractor implements KeywordExtractor {
  private readonly limit: number;
  private readonly minWordLength: number;

  constructor(
    private readonly tokenizer: Tokenizer,
    options: KeywordOptions = {},
  ) {
    this.limit = options.limit ?? 5;
    this.minWordLength = options.minWordLength ?? 3;
  }

  extract(text: string, strategy: AnnotationStrategy): Keywords {
    const terms: string[] = [];
    for (const tok of this.tokenizer.tokenize(text, {
      normalizeCase: true,
      removeStopWords: true,
      minLength: this.minWordLength,
    })) {
      terms.push(tok.term);
    }

    return {
      topWords: mostCommon(terms, this.limit),
      nouns: mostCommon(strategy.wordsTagged("noun"), this.limit),
      verbs: mostCommon(strategy.wordsTagged("verb"), this.limit),
    };
  }
}
