import { describe, expect, it } from "vitest";
import { assertWellFormed } from "../documentGuard.js";
import { MalformedAnnotationError } from "../../errors.js";
import { document, sentence, tokens } from "./fixtures.js";

describe("assertWellFormed", () => {
  it("accepts position-indexed sentences and tokens", () => {
    expect(() => assertWellFormed(document(sentence(0, "Hola."), sentence(1, "Adiós.")))).not.toThrow();
  });

  it("rejects a document without sentences", () => {
    expect(() => assertWellFormed(document())).toThrow(MalformedAnnotationError);
  });

  it("rejects sentences out of order", () => {
    expect(() => assertWellFormed(document(sentence(0, "Uno."), sentence(2, "Dos.")))).toThrow(
      "sentence at position 1 has index 2",
    );
  });

  it("rejects tokens out of order", () => {
    const shuffled = tokens(["a"], ["b"]).reverse();
    expect(() => assertWellFormed(document({ index: 0, text: "b a", tokens: shuffled }))).toThrow(
      "token at position 0 of sentence 0 has index 1",
    );
  });

  it("rejects an empty sentence", () => {
    expect(() => assertWellFormed(document({ index: 0, text: "  ", tokens: [] }))).toThrow("sentence 0 is empty");
  });
});
