export type CodeLinter = (code: string) => string;

/** Strips trailing whitespace and collapses long runs of blank lines. */
export const lintCode: CodeLinter = (code) =>
  code
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .replace(/\n+$/, '');
