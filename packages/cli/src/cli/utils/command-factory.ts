// pattern: Factory

/**
 * Standard help text patterns for the collector's usage summary
 */
export const HelpTextPatterns = {
  /**
   * Creates an indented "Description:" section
   */
  description: (lines: string[]): string => `
Description:
${lines.map(line => `  ${line}`).join("\n")}
`,

  /**
   * Points the reader at the issue tracker
   */
  reportIssue: (url: string): string => `
The output can be pasted directly into an issue at:

    ${url}
`,
};
