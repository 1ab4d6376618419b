export interface PatternMatches {
  dates: string[];
  money: string[];
  emails: string[];
}

/** Surface patterns found by plain matching; no annotation involved. */
export interface PatternFinder {
  find(text: string): PatternMatches;
}
