import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { spa } from "stopword";
import { z } from "zod";

import type { Lexicon } from "../lexicon.js";

export const DEFAULT_LEXICON_DIR = fileURLToPath(new URL("../../../data/es/", import.meta.url));

const CORRECTIONS_FILE = "corrections.json";
const GENDERED_NOUNS_FILE = "gendered-nouns.json";
const STOPWORDS_FILE = "stopwords.json";

const header = {
  version: z.string().min(1),
  language: z.literal("es"),
};

const tableSchema = z.object({
  ...header,
  entries: z.record(z.string().min(1), z.string().min(1)),
});

const wordListSchema = z.object({
  ...header,
  words: z.array(z.string().min(1)),
});

export type LexiconTable = z.infer<typeof tableSchema>;
export type WordList = z.infer<typeof wordListSchema>;

export interface LexiconSource {
  corrections: Record<string, string>;
  genderedNouns: Record<string, string>;
  stopwords?: Iterable<string>;
  version?: string;
}

function caseFold(entries: Record<string, string>): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(entries)) map.set(key.toLowerCase(), value);
  return map;
}

/** Builds a lexicon from in-memory tables; stopwords default to the Spanish list. */
export function createLexicon(source: LexiconSource): Lexicon {
  const stopwords = new Set<string>();
  for (const w of source.stopwords ?? spa) stopwords.add(w.toLowerCase());

  return Object.freeze({
    corrections: caseFold(source.corrections),
    genderedNouns: caseFold(source.genderedNouns),
    stopwords,
    version: source.version ?? "inline",
  });
}

function readValidated<T>(path: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid table";
    throw new Error(`invalid lexicon table ${path}: ${where}`);
  }
  return parsed.data;
}

export function readTable(path: string): LexiconTable {
  return readValidated(path, tableSchema);
}

export function readWordList(path: string): WordList {
  return readValidated(path, wordListSchema);
}

/**
 * Loads the correction, gendered-noun and stopword tables from `dir`.
 * The bundled stopwords are merged with the `stopword` package's Spanish list.
 * Call once at startup; the result is shared read-only.
 */
export function loadLexicon(dir: string = DEFAULT_LEXICON_DIR): Lexicon {
  const corrections = readTable(join(dir, CORRECTIONS_FILE));
  const genderedNouns = readTable(join(dir, GENDERED_NOUNS_FILE));
  const stopwords = readWordList(join(dir, STOPWORDS_FILE));

  return createLexicon({
    corrections: corrections.entries,
    genderedNouns: genderedNouns.entries,
    stopwords: [...spa, ...stopwords.words],
    version: `${corrections.version}+${genderedNouns.version}+${stopwords.version}`,
  });
}
