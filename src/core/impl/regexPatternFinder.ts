import type { PatternFinder, PatternMatches } from "../patterns.js";

// dd/mm/yyyy, dd-mm-yy, yyyy-mm-dd ...
const DATE = /\b(?:\d{1,2}[/-]\d{1,2}[/-]\d{2,4}|\d{4}[/-]\d{1,2}[/-]\d{1,2})\b/g;
// "1.200,50 euros", "25 €", "100 USD"
const MONEY = /\b(?:(?:€\s?)?\d{1,3}(?:[.,]\d{3})*(?:[.,]\d+)?\s?(?:€|euros|USD|\$)|\$\d+(?:\.\d+)?\b)/g;
// \w and \b are ASCII-only in JS; local parts and domains may carry accented letters
const EMAIL = /(?<![\p{L}\p{N}_.-])[\p{L}\p{N}_.-]+@[\p{L}\p{N}_.-]+\.[\p{L}\p{N}_]{2,4}(?![\p{L}\p{N}_])/gu;

function all(pattern: RegExp, text: string): string[] {
  return Array.from(text.matchAll(pattern), (m) => m[0]);
}

export class RegexPatternFinder implements PatternFinder {
  find(text: string): PatternMatches {
    return {
      dates: all(DATE, text),
      money: all(MONEY, text),
      emails: all(EMAIL, text),
    };
  }
}
