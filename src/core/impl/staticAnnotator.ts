import type { AnnotationResult, Annotator } from "../annotator.js";
import type { Document } from "../types.js";

/**
 * Serves pre-built documents keyed by exact input text.
 * Texts it does not know are reported unavailable.
 */
export class StaticAnnotator implements Annotator {
  private readonly documents: ReadonlyMap<string, Document>;

  constructor(documents: Iterable<readonly [string, Document]>) {
    this.documents = new Map(documents);
  }

  async annotate(text: string): Promise<AnnotationResult> {
    const document = this.documents.get(text);
    return document ? { status: "ok", document } : { status: "unavailable", reason: "text not annotated" };
  }
}
