import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { DEFAULT_LEXICON_DIR } from "../core/impl/jsonLexicon.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({}, { useDotenv: false })).toEqual({
      port: 3000,
      logLevel: undefined,
      annotatorUrl: undefined,
      annotatorTimeoutMs: 5000,
      summaryMaxSentences: 3,
      lexiconDir: DEFAULT_LEXICON_DIR,
    });
  });

  it("reads and trims values", () => {
    const config = loadConfig(
      {
        PORT: "8080",
        LOG_LEVEL: "warn",
        ANNOTATOR_URL: " http://annotator.test:8000 ",
        ANNOTATOR_TIMEOUT_MS: "250",
        SUMMARY_MAX_SENTENCES: "5",
        LEXICON_DIR: "/srv/lexicon",
      },
      { useDotenv: false },
    );
    expect(config).toEqual({
      port: 8080,
      logLevel: "warn",
      annotatorUrl: "http://annotator.test:8000",
      annotatorTimeoutMs: 250,
      summaryMaxSentences: 5,
      lexiconDir: "/srv/lexicon",
    });
  });

  it("falls back on unusable numbers", () => {
    const config = loadConfig(
      { PORT: "abc", ANNOTATOR_TIMEOUT_MS: "0", SUMMARY_MAX_SENTENCES: "-2", ANNOTATOR_URL: "   " },
      { useDotenv: false },
    );
    expect(config.port).toBe(3000);
    expect(config.annotatorTimeoutMs).toBe(5000);
    expect(config.summaryMaxSentences).toBe(3);
    expect(config.annotatorUrl).toBeUndefined();
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}, { useDotenv: false }))).toBe(true);
  });
});
