import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { AnnotationResult, Annotator } from "../annotator.js";
import type { Document, PartOfSpeech } from "../types.js";
import { MalformedAnnotationError } from "../errors.js";
import { logger, type Logger } from "../../logger.js";

const tokenSchema = z.object({
  index: z.number().int(),
  text: z.string().min(1),
  lemma: z.string().optional(),
  pos: z.string(),
});

const payloadSchema = z.object({
  sentences: z.array(
    z.object({
      index: z.number().int(),
      text: z.string(),
      tokens: z.array(tokenSchema),
    }),
  ),
});

/** Universal Dependencies tag -> closed core set. */
export function mapTag(tag: string): PartOfSpeech {
  switch (tag.toUpperCase()) {
    case "NOUN":
      return "noun";
    case "VERB":
      return "verb";
    case "DET":
      return "determiner";
    default:
      return "other";
  }
}

export interface HttpAnnotatorOptions {
  baseURL?: string;
  /** request timeout in ms; the engine enforces its own deadline as well */
  timeoutMs?: number;
  /** route on the annotation service */
  path?: string;
  language?: string;
  /** preconfigured client; takes precedence over baseURL/timeoutMs */
  client?: AxiosInstance;
  logger?: Logger;
}

/**
 * Annotator backed by a spaCy-style HTTP service.
 *
 * POST {path} with `{ text, language }`, expecting
 * `{ sentences: [{ index, text, tokens: [{ index, text, lemma?, pos }] }] }`.
 * Transport failures and non-2xx answers mean "unavailable"; a body that
 * does not match the shape is a MalformedAnnotationError.
 */
export class HttpAnnotator implements Annotator {
  private readonly client: AxiosInstance;
  private readonly path: string;
  private readonly language: string;
  private readonly log: Logger;

  constructor(options: HttpAnnotatorOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs ?? 5000,
        headers: { "content-type": "application/json" },
      });
    this.path = options.path ?? "/annotate";
    this.language = options.language ?? "es";
    this.log = (options.logger ?? logger).child({ component: "httpAnnotator" });
  }

  async annotate(text: string): Promise<AnnotationResult> {
    let body: unknown;
    try {
      const res = await this.client.post<unknown>(this.path, { text, language: this.language });
      body = res.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const reason = err.response ? `annotator answered ${err.response.status}` : `annotator request failed: ${err.message}`;
        this.log.warn({ code: err.code, status: err.response?.status }, reason);
        return { status: "unavailable", reason };
      }
      throw err;
    }

    const parsed = payloadSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unexpected body";
      throw new MalformedAnnotationError(`annotator payload invalid at ${where}`);
    }

    const document: Document = {
      sentences: parsed.data.sentences.map((s) => ({
        index: s.index,
        text: s.text,
        tokens: s.tokens.map((t) => ({
          index: t.index,
          text: t.text,
          lemma: t.lemma ?? t.text,
          pos: mapTag(t.pos),
        })),
      })),
    };
    return { status: "ok", document };
  }
}
