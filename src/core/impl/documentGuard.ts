import type { Document } from "../types.js";
import { MalformedAnnotationError } from "../errors.js";

/**
 * Throws MalformedAnnotationError unless every sentence and token index
 * equals its position and no sentence is empty.
 */
export function assertWellFormed(doc: Document): void {
  if (doc.sentences.length === 0) {
    throw new MalformedAnnotationError("annotation has no sentences");
  }

  doc.sentences.forEach((sentence, position) => {
    if (sentence.index !== position) {
      throw new MalformedAnnotationError(`sentence at position ${position} has index ${sentence.index}`);
    }
    if (sentence.tokens.length === 0 || sentence.text.trim().length === 0) {
      throw new MalformedAnnotationError(`sentence ${position} is empty`);
    }
    sentence.tokens.forEach((token, tokenPosition) => {
      if (token.index !== tokenPosition) {
        throw new MalformedAnnotationError(
          `token at position ${tokenPosition} of sentence ${position} has index ${token.index}`,
        );
      }
    });
  });
}
