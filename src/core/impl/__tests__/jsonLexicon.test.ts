import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";
import { createLexicon, loadLexicon, readTable, readWordList } from "../jsonLexicon.js";
import { FrequencyKeywordExtractor } from "../frequencyKeywordExtractor.js";
import { HeuristicStrategy } from "../heuristicStrategy.js";
import { NounDensityScorer } from "../nounDensityScorer.js";
import { WordTokenizer } from "../wordTokenizer.js";

function tempTable(content: unknown): string {
  const dir = mkdtempSync(join(tmpdir(), "texnorm-lexicon-"));
  const path = join(dir, "table.json");
  writeFileSync(path, JSON.stringify(content));
  return path;
}

describe("loadLexicon", () => {
  const lexicon = loadLexicon();

  it("loads the bundled Spanish tables", () => {
    expect(lexicon.corrections.get("haiga")).toBe("haya");
    expect(lexicon.corrections.get("enserio")).toBe("en serio");
    expect(lexicon.genderedNouns.get("niño")).toBe("el niño");
    expect(lexicon.version).toBe("1.0.0+1.0.0+1.0.0");
  });

  it("leaves haber to the contextual rule", () => {
    expect(lexicon.corrections.has("haber")).toBe(false);
  });

  it("uses the Spanish stopword list", () => {
    expect(lexicon.stopwords.has("de")).toBe(true);
    expect(lexicon.stopwords.has("que")).toBe(true);
    expect(lexicon.stopwords.has("perro")).toBe(false);
  });

  it("covers verb forms and demonstratives missing from the package list", () => {
    for (const word of ["está", "este", "esta", "es", "son", "fue", "hay", "todo", "ser"]) {
      expect(lexicon.stopwords.has(word)).toBe(true);
    }
  });

  it("keeps function words out of the top keywords", () => {
    const text = "Este proyecto está listo. Esta semana está todo el equipo y hay café. El proyecto está terminado.";
    const extractor = new FrequencyKeywordExtractor(new WordTokenizer(lexicon.stopwords));
    const { topWords } = extractor.extract(text, new HeuristicStrategy(text, new NounDensityScorer()));
    expect(topWords).toEqual([
      { term: "proyecto", count: 2 },
      { term: "listo", count: 1 },
      { term: "semana", count: 1 },
      { term: "equipo", count: 1 },
      { term: "café", count: 1 },
    ]);
  });
});

describe("createLexicon", () => {
  it("case-folds keys and keeps values as written", () => {
    const lexicon = createLexicon({ corrections: { Haiga: "Haya" }, genderedNouns: { CASA: "la casa" }, stopwords: ["EL"] });
    expect(lexicon.corrections.get("haiga")).toBe("Haya");
    expect(lexicon.genderedNouns.get("casa")).toBe("la casa");
    expect(lexicon.stopwords.has("el")).toBe(true);
  });
});

describe("readWordList", () => {
  it("accepts a well-formed list", () => {
    const path = tempTable({ version: "2", language: "es", words: ["aquel", "aquella"] });
    expect(readWordList(path).words).toEqual(["aquel", "aquella"]);
  });

  it("names the offending word", () => {
    const path = tempTable({ version: "2", language: "es", words: ["aquel", ""] });
    expect(() => readWordList(path)).toThrow(/invalid lexicon table .*words\.1/);
  });
});

describe("readTable", () => {
  it("accepts a well-formed table", () => {
    const path = tempTable({ version: "2", language: "es", entries: { nadien: "nadie" } });
    expect(readTable(path).entries).toEqual({ nadien: "nadie" });
  });

  it("names the offending entry", () => {
    const path = tempTable({ version: "2", language: "es", entries: { nadien: 1 } });
    expect(() => readTable(path)).toThrow(/entries\.nadien/);
  });

  it("rejects another language", () => {
    const path = tempTable({ version: "2", language: "en", entries: {} });
    expect(() => readTable(path)).toThrow(/invalid lexicon table .*language/);
  });
});
