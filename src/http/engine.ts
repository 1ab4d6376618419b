import type { AppConfig } from "../config.js";
import type { Lexicon } from "../core/lexicon.js";
import { HttpAnnotator, TextEngine, loadLexicon } from "../core/impl/index.js";
import { logger as rootLogger, type Logger } from "../logger.js";

export interface CreateEngineOptions {
  /** already-loaded lexicon; loaded from `config.lexiconDir` when omitted */
  lexicon?: Lexicon;
  logger?: Logger;
}

/** Wires the engine from configuration: one lexicon, one annotator client. */
export function createEngine(
  config: Pick<AppConfig, "annotatorUrl" | "annotatorTimeoutMs" | "lexiconDir">,
  opts: CreateEngineOptions = {},
): TextEngine {
  const log = opts.logger ?? rootLogger;
  const lexicon = opts.lexicon ?? loadLexicon(config.lexiconDir);

  const annotator = config.annotatorUrl
    ? new HttpAnnotator({ baseURL: config.annotatorUrl, timeoutMs: config.annotatorTimeoutMs, logger: log })
    : undefined;

  log.info(
    {
      lexicon: lexicon.version,
      corrections: lexicon.corrections.size,
      genderedNouns: lexicon.genderedNouns.size,
      annotator: config.annotatorUrl ?? null,
    },
    annotator ? "engine ready" : "engine ready without annotator; heuristic mode only",
  );

  return new TextEngine({ lexicon, annotator, annotatorTimeoutMs: config.annotatorTimeoutMs, logger: log });
}
