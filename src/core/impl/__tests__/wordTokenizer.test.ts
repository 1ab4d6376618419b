import { describe, expect, it } from "vitest";
import { WordTokenizer, splitWords } from "../wordTokenizer.js";

describe("WordTokenizer", () => {
  const tokenizer = new WordTokenizer(new Set(["el"]));

  it("splits on non-letters, lowercases and numbers positions", () => {
    expect(Array.from(tokenizer.tokenize("¡Hola, Mundo! El niño 2024"))).toEqual([
      { term: "hola", position: 0 },
      { term: "mundo", position: 1 },
      { term: "el", position: 2 },
      { term: "niño", position: 3 },
      { term: "2024", position: 4 },
    ]);
  });

  it("drops stopwords and short terms but keeps positions", () => {
    const terms = Array.from(tokenizer.tokenize("El sol y la Luna", { removeStopWords: true, minLength: 3 }));
    expect(terms).toEqual([
      { term: "sol", position: 1 },
      { term: "luna", position: 4 },
    ]);
  });

  it("can keep case", () => {
    expect(Array.from(tokenizer.tokenize("Ana", { normalizeCase: false }), (t) => t.term)).toEqual(["Ana"]);
  });
});

describe("splitWords", () => {
  it("splits on any whitespace run", () => {
    expect(splitWords("  uno\tdos\n\ntres ")).toEqual(["uno", "dos", "tres"]);
  });
});
