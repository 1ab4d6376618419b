import type { Document } from "./types.js";

export type AnnotationResult =
  | { status: "ok"; document: Document }
  | { status: "unavailable"; reason: string };

/**
 * Tokenization, tagging, lemmatization and sentence segmentation.
 *
 * Contract notes:
 * - sentences are non-overlapping, cover the input in order and are non-empty
 * - token and sentence `index` values equal their position, starting at 0
 * - "unavailable" is recoverable; a contract violation is not
 */
export interface Annotator {
  annotate(text: string): Promise<AnnotationResult>;
}
