import path from 'node:path';

import { fromProjectConfig } from './core/renderer.js';
import { parseExpectationSuite, type BatchKwargs, type ExpectationSuiteInput } from './core/suite.js';

export interface GenerateNotebookOptions {
  notebookPath: string;
  /** Project config holding an optional `notebooks.suite_edit` section. */
  projectConfig?: unknown;
  /** Base for relative paths in the project config. */
  projectRoot?: string;
  batchKwargs?: BatchKwargs;
}

export interface GenerationResult {
  notebookPath: string;
  suiteName: string;
  expectationCount: number;
  cellCount: number;
}

export async function generateNotebook(
  suite: ExpectationSuiteInput,
  options: GenerateNotebookOptions
): Promise<GenerationResult> {
  const { projectConfig, projectRoot, batchKwargs } = options;
  const notebookPath = path.resolve(options.notebookPath);

  const parsed = parseExpectationSuite(suite);
  const renderer = fromProjectConfig(projectConfig, { baseDir: projectRoot });
  const notebook = await renderer.renderToDisk(parsed, notebookPath, batchKwargs);

  return {
    notebookPath,
    suiteName: parsed.expectation_suite_name,
    expectationCount: parsed.expectations.length,
    cellCount: notebook.cells.length
  };
}
