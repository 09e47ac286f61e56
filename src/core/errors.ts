import type { ZodIssue } from 'zod';

export function describeIssues(issues: ZodIssue[], fallback: string): string[] {
  return issues.map((issue) => `${issue.path.join('.') || fallback}: ${issue.message}`);
}

/** Raised by `render` when it is not handed a well-formed expectation suite. */
export class InvalidSuiteError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(['render must be given an expectation suite.', ...issues.map((issue) => `- ${issue}`)].join('\n'));
    this.name = 'InvalidSuiteError';
    this.issues = issues;
  }
}

export class TemplateSourceNotFoundError extends Error {
  readonly templatesDir: string;

  constructor(templatesDir: string) {
    super(`Custom templates directory not found: ${templatesDir}`);
    this.name = 'TemplateSourceNotFoundError';
    this.templatesDir = templatesDir;
  }
}

export class TemplateNotFoundError extends Error {
  readonly templateName: string;

  constructor(templateName: string, searched: string[] = []) {
    super(
      searched.length > 0
        ? `Template not found: ${templateName} (searched ${searched.join(', ')})`
        : `Template not found: ${templateName}`
    );
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
  }
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(['Config validation failed:', ...issues.map((issue) => `- ${issue}`)].join('\n'));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
