import * as dotenv from "dotenv";

import { DEFAULT_LEXICON_DIR } from "./core/impl/jsonLexicon.js";

export interface AppConfig {
  port: number;
  logLevel: string | undefined;
  /** Annotation service base URL; undefined runs every call in heuristic mode. */
  annotatorUrl: string | undefined;
  annotatorTimeoutMs: number;
  summaryMaxSentences: number;
  lexiconDir: string;
}

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return Number.isNaN(num) ? defaultValue : num;
}

function parseOptionalEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Reads configuration from the environment (and `.env`, when present).
 * Out-of-range numbers fall back to their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, { useDotenv = true } = {}): AppConfig {
  if (useDotenv) dotenv.config();

  const port = parseNumericEnv(env.PORT, 3000);
  const timeout = parseNumericEnv(env.ANNOTATOR_TIMEOUT_MS, 5000);
  const maxSentences = parseNumericEnv(env.SUMMARY_MAX_SENTENCES, 3);

  return Object.freeze({
    port: port >= 0 && port <= 65535 ? port : 3000,
    logLevel: parseOptionalEnv(env.LOG_LEVEL),
    annotatorUrl: parseOptionalEnv(env.ANNOTATOR_URL),
    annotatorTimeoutMs: timeout > 0 ? timeout : 5000,
    summaryMaxSentences: maxSentences >= 1 ? maxSentences : 3,
    lexiconDir: parseOptionalEnv(env.LEXICON_DIR) ?? DEFAULT_LEXICON_DIR,
  });
}
