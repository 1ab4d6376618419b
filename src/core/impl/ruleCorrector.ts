import type { Corrector } from "../corrector.js";
import type { Lexicon } from "../lexicon.js";
import type { Token } from "../types.js";

const NEUTER_ARTICLE = "lo";
const DEFAULT_ARTICLE = "el";
const HOMOPHONE = "haber";
const HOMOPHONE_REPLACEMENT = "a ver";
/** Present forms of "ir"/"querer" that precede an exhortative "a ver". */
const EXHORTATIVE_LEADS: ReadonlySet<string> = new Set(["vamos", "voy", "van", "vas", "quiera"]);

/**
 * Table-driven corrections with one token of context either side.
 *
 * Per token, first match wins:
 * - repeat of the previous source token (case-insensitive): dropped
 * - correction table hit: replacement
 * - determiner "lo": gendered phrase for the next lemma, consuming that noun, or "el"
 * - "haber" after an exhortative lead: "a ver"
 * - otherwise the surface text
 *
 * A run of identical tokens is decided by its first token alone, so
 * "haiga haiga" yields one "haya".
 */
export class RuleCorrector implements Corrector {
  constructor(private readonly lexicon: Lexicon) {}

  correct(tokens: readonly Token[]): string {
    const out: string[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i]!;
      const lower = token.text.toLowerCase();
      const previous = i > 0 ? tokens[i - 1]!.text.toLowerCase() : undefined;

      if (lower === previous) continue;

      const replacement = this.lexicon.corrections.get(lower);
      if (replacement !== undefined) {
        out.push(replacement);
        continue;
      }

      if (lower === NEUTER_ARTICLE && token.pos === "determiner") {
        const next = tokens[i + 1];
        const phrase = next ? this.lexicon.genderedNouns.get(next.lemma.toLowerCase()) : undefined;
        if (phrase !== undefined) {
          out.push(phrase);
          i++; // the phrase already carries the noun
        } else {
          out.push(DEFAULT_ARTICLE);
        }
        continue;
      }

      if (lower === HOMOPHONE && previous !== undefined && EXHORTATIVE_LEADS.has(previous)) {
        out.push(HOMOPHONE_REPLACEMENT);
        continue;
      }

      out.push(token.text);
    }

    return out.join(" ");
  }
}
