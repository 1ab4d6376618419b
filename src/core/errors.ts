export type TextErrorCode = "EMPTY_INPUT" | "INVALID_ARGUMENT" | "MALFORMED_ANNOTATION";

export class TextProcessingError extends Error {
  constructor(
    readonly code: TextErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends TextProcessingError {
  constructor() {
    super("EMPTY_INPUT", "text is empty");
  }
}

export class InvalidArgumentError extends TextProcessingError {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super("INVALID_ARGUMENT", message);
  }
}

/** The annotator broke its contract. Fatal to the call. */
export class MalformedAnnotationError extends TextProcessingError {
  constructor(message: string) {
    super("MALFORMED_ANNOTATION", message);
  }
}

export function assertNotEmpty(text: string): void {
  if (text.trim().length === 0) throw new EmptyInputError();
}

export function assertMaxSentences(maxSentences: number): void {
  if (!Number.isInteger(maxSentences) || maxSentences < 1) {
    throw new InvalidArgumentError("maxSentences", "maxSentences must be an integer >= 1");
  }
}
