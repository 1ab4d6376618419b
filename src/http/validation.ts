import type { FieldError } from "./problem.js";

export const MAX_TEXT_LENGTH = 200_000;
export const MAX_SUMMARY_SENTENCES = 50;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/**
 * `$.text` must be a string of bounded length. Blank strings pass here and
 * are rejected by the engine as empty input.
 */
export function readText(body: Record<string, unknown>, errors: FieldError[]): string {
  const text = asString(body.text);
  if (text === undefined) {
    pushErr(errors, "$.text", "must be a string");
    return "";
  }
  if (text.length > MAX_TEXT_LENGTH) pushErr(errors, "$.text", "too long");
  return text;
}

export function readMaxSentences(body: Record<string, unknown>, fallback: number, errors: FieldError[]): number {
  if (body.maxSentences === undefined) return fallback;
  const n = asInt(body.maxSentences);
  if (n === undefined || n < 1 || n > MAX_SUMMARY_SENTENCES) {
    pushErr(errors, "$.maxSentences", `must be an integer between 1 and ${MAX_SUMMARY_SENTENCES}`);
    return fallback;
  }
  return n;
}
