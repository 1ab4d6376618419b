import type { Document, PartOfSpeech, Sentence, Token } from "../../types.js";
import { createLexicon } from "../jsonLexicon.js";

export interface WordTag {
  pos?: PartOfSpeech;
  lemma?: string;
}

/**
 * Builds an annotated sentence by splitting `text` on spaces, with a
 * trailing period as its own token. Words missing from `tags` are "other".
 */
export function sentence(index: number, text: string, tags: Record<string, WordTag> = {}): Sentence {
  const words = text.replace(/\.$/, " .").split(/\s+/).filter((w) => w.length > 0);
  const tokens: Token[] = words.map((w, i) => ({
    text: w,
    lemma: tags[w]?.lemma ?? w,
    pos: tags[w]?.pos ?? "other",
    index: i,
  }));
  return { index, text, tokens };
}

export function document(...sentences: Sentence[]): Document {
  return { sentences };
}

export function tokens(...entries: Array<[string, PartOfSpeech?, string?]>): Token[] {
  return entries.map(([text, pos, lemma], index) => ({ text, pos: pos ?? "other", lemma: lemma ?? text, index }));
}

export const lexicon = createLexicon({
  corrections: { haiga: "haya", enserio: "en serio", nadien: "nadie" },
  genderedNouns: { niño: "el niño", niña: "la niña", casa: "la casa" },
  stopwords: ["el", "la", "y", "de", "que", "si"],
  version: "test",
});
