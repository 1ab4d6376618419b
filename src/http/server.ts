import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { isRecord, readMaxSentences, readText } from "./validation.js";
import { TextProcessingError, type TextErrorCode } from "../core/errors.js";
import type { TextEngine } from "../core/impl/index.js";
import { logger as rootLogger, type Logger } from "../logger.js";

const SERVICE = "texnorm";
const VERSION = "0.1.0";

export interface ServerOptions {
  port?: number;
  engine: TextEngine;
  /** default for /summarize when the body has no maxSentences */
  summaryMaxSentences?: number;
  logger?: Logger;
}

interface RequestContext {
  requestId: string;
  instance: string;
}

const ERROR_STATUS: Record<TextErrorCode, number> = {
  EMPTY_INPUT: 422,
  INVALID_ARGUMENT: 400,
  MALFORMED_ANNOTATION: 502,
};

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const engine = opts.engine;
  const defaultMaxSentences = opts.summaryMaxSentences ?? 3;
  const log = (opts.logger ?? rootLogger).child({ component: "http" });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const ctx: RequestContext = { requestId, instance: url.pathname };
    const started = Date.now();
    const reqLog = log.child({ requestId });

    res.on("finish", () => {
      reqLog.info({ method: req.method, path: url.pathname, status: res.statusCode, tookMs: Date.now() - started }, "request completed");
    });

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          annotator: engine.hasAnnotator ? "configured" : "none",
        });
      }

      if (req.method === "POST" && url.pathname === "/normalize") {
        const body = await readBody(req, res, ctx);
        if (!body) return;
        const errors: FieldError[] = [];
        const text = readText(body, errors);
        if (errors.length) return sendInvalid(res, ctx, errors);
        return sendJson(res, 200, await engine.normalize(text));
      }

      if (req.method === "POST" && url.pathname === "/summarize") {
        const body = await readBody(req, res, ctx);
        if (!body) return;
        const errors: FieldError[] = [];
        const text = readText(body, errors);
        const maxSentences = readMaxSentences(body, defaultMaxSentences, errors);
        if (errors.length) return sendInvalid(res, ctx, errors);
        return sendJson(res, 200, await engine.summarize(text, maxSentences));
      }

      if (req.method === "POST" && url.pathname === "/keywords") {
        const body = await readBody(req, res, ctx);
        if (!body) return;
        const errors: FieldError[] = [];
        const text = readText(body, errors);
        if (errors.length) return sendInvalid(res, ctx, errors);
        return sendJson(res, 200, await engine.keywords(text));
      }

      if (req.method === "POST" && url.pathname === "/patterns") {
        const body = await readBody(req, res, ctx);
        if (!body) return;
        const errors: FieldError[] = [];
        const text = readText(body, errors);
        if (errors.length) return sendInvalid(res, ctx, errors);
        return sendJson(res, 200, engine.patterns(text));
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", ...ctx }));
    } catch (e) {
      if (e instanceof TextProcessingError) {
        const status = ERROR_STATUS[e.code];
        if (status >= 500) reqLog.error({ err: e }, "annotation contract violated");
        return sendProblem(res, problem({ status, code: e.code, detail: e.message, ...ctx }));
      }
      reqLog.error({ err: e }, "unhandled error");
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", ...ctx }));
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

/** Parses a JSON object body, or answers with a problem and returns undefined. */
async function readBody(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RequestContext,
): Promise<Record<string, unknown> | undefined> {
  if (!isJson(req)) {
    sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", ...ctx }));
    return undefined;
  }

  let body: unknown;
  try {
    body = await readJson(req);
  } catch (e) {
    if (!(e instanceof SyntaxError)) throw e;
    sendProblem(res, problem({ status: 400, code: "INVALID_JSON", detail: e.message, ...ctx }));
    return undefined;
  }

  if (!isRecord(body)) {
    sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", ...ctx }));
    return undefined;
  }
  return body;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}

function sendInvalid(res: http.ServerResponse, ctx: RequestContext, errors: FieldError[]): void {
  sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors, ...ctx }));
}
