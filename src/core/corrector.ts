import type { Token } from "./types.js";

/** Rewrites a token stream into one corrected string. Never reorders tokens. */
export interface Corrector {
  correct(tokens: readonly Token[]): string;
}
