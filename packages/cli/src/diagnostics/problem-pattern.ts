// pattern: Functional Core
// Keyword vocabulary used to flag log lines as likely problems

/**
 * Entries use grep's word anchors: `\<` marks the start of a word and `\>`
 * its end. `.*` is a gap of any length, so `not.*exist` also catches
 * "does definitely not exist". The list is kept verbatim so reports stay
 * comparable with older ones.
 */
export const PROBLEM_VOCABULARY: readonly string[] = Object.freeze([
  "\\<abort",
  "\\<bug\\>",
  "\\<cannot\\>",
  "\\<catastrophic",
  "\\<could not\\>",
  "\\<couldn't\\>",
  "\\<critical",
  "\\<die\\>",
  "\\<died\\>",
  "\\<doesn't",
  "\\<error\\>",
  "\\<fail",
  "\\<fatal",
  "\\<ignoring\\>",
  "\\<invalid\\>",
  "\\<issue",
  "\\<missing\\>",
  "\\<mismatch",
  "\\<must",
  "\\<non.*exist",
  "\\<not.*exist",
  "\\<not.*found",
  "\\<no.*such.*file",
  "\\<not.*supported",
  "\\<only\\>",
  "\\<panic",
  "\\<problem",
  "\\<refuse",
  "\\<reject",
  "\\<should\\>",
  "\\<stop",
  "\\<too.*many",
  "\\<unable",
  "\\<unavailable",
  "\\<unexpected",
  "\\<unknown",
  "\\<warn",
  "\\<wrong\\>",
  "\\<would\\>",
]);

// Translate grep word anchors into JavaScript word boundaries
export function toRegExpSource(entry: string): string {
  return entry.replaceAll("\\<", "\\b").replaceAll("\\>", "\\b");
}

export class ProblemMatcher {
  private readonly pattern: RegExp;

  constructor(vocabulary: readonly string[] = PROBLEM_VOCABULARY) {
    if (vocabulary.length === 0) {
      throw new Error("Problem vocabulary must not be empty");
    }
    this.pattern = new RegExp(
      `(${vocabulary.map(toRegExpSource).join("|")})`,
      "i"
    );
  }

  matches(line: string): boolean {
    return this.pattern.test(line);
  }
}

export const PROBLEM_MATCHER = new ProblemMatcher();
