import path from 'node:path';
import process from 'node:process';

import { resolveBatchKwargs } from './batchKwargs.js';
import {
  loadNotebookConfig,
  loadSuiteEditConfig,
  type HeaderMarkdownConfig,
  type NotebookConfigInput
} from './config.js';
import { buildKwargsString, buildMetaArguments, columnName, toPythonLiteral } from './formatters.js';
import { groupExpectationsByColumn, type GroupedExpectations } from './grouping.js';
import { lintCode, type CodeLinter } from './lint.js';
import {
  newCodeCell,
  newMarkdownCell,
  newNotebook,
  writeNotebook,
  type Notebook,
  type NotebookCell
} from './notebook.js';
import { parseExpectationSuite, type BatchKwargs, type Expectation, type ExpectationSuiteInput } from './suite.js';
import { createTemplateChain, type TemplateChain } from './templateSources.js';
import { TEMPLATE_NAMES, type TemplateName } from './templates.js';

export interface RendererOptions {
  /** Directory searched for templates before the built-in ones. */
  customTemplatesDir?: string;
  headerMarkdown?: HeaderMarkdownConfig;
  lint?: CodeLinter;
}

/**
 * Renders a notebook that can re-create or edit an expectation suite, e.g. one
 * a profiler created or one that only exists as JSON.
 */
export class SuiteEditNotebookRenderer {
  readonly templates: TemplateChain;
  private readonly headerMarkdown?: HeaderMarkdownConfig;
  private readonly lint: CodeLinter;

  constructor(options: RendererOptions = {}) {
    this.templates = createTemplateChain(options.customTemplatesDir);
    this.headerMarkdown = options.headerMarkdown;
    this.lint = options.lint ?? lintCode;
  }

  /**
   * Builds the notebook. Explicit `batchKwargs` override any found in the
   * suite citations.
   */
  render(suite: ExpectationSuiteInput, batchKwargs?: BatchKwargs | null): Notebook {
    const parsed = parseExpectationSuite(suite);
    const builder = new CellBuilder(this.templates, this.lint);
    const suiteName = parsed.expectation_suite_name;

    this.addHeader(builder, suiteName, resolveBatchKwargs(parsed, batchKwargs));
    builder.markdown(TEMPLATE_NAMES.authoringIntro);
    this.addExpectationCells(builder, groupExpectationsByColumn(parsed.expectations));
    builder.markdown(TEMPLATE_NAMES.footerMarkdown);
    builder.code(TEMPLATE_NAMES.footerCode);

    return newNotebook(builder.cells);
  }

  async renderToDisk(
    suite: ExpectationSuiteInput,
    notebookPath: string,
    batchKwargs?: BatchKwargs | null
  ): Promise<Notebook> {
    const notebook = this.render(suite, batchKwargs);
    await writeNotebook(notebook, notebookPath);
    return notebook;
  }

  private addHeader(builder: CellBuilder, suiteName: string, batchKwargs: BatchKwargs | undefined): void {
    if (this.headerMarkdown) {
      builder.markdown(this.headerMarkdown.file_name, {
        ...this.headerMarkdown.template_kwargs,
        suite_name: suiteName
      });
    } else {
      builder.markdown(TEMPLATE_NAMES.headerMarkdown, { suite_name: suiteName });
    }

    builder.code(
      TEMPLATE_NAMES.headerCode,
      { suite_name: suiteName, batch_kwargs: toPythonLiteral(batchKwargs ?? {}) },
      true
    );
  }

  private addExpectationCells(builder: CellBuilder, grouped: GroupedExpectations): void {
    builder.markdown(TEMPLATE_NAMES.tableHeader);
    if (grouped.table.length === 0) {
      builder.markdown(TEMPLATE_NAMES.tableNotFound);
    }
    for (const expectation of grouped.table) {
      builder.code(TEMPLATE_NAMES.tableExpectation, expectationParams(expectation), true);
    }

    builder.markdown(TEMPLATE_NAMES.columnHeader);
    if (grouped.columns.size === 0) {
      builder.markdown(TEMPLATE_NAMES.columnNotFound);
    }
    for (const [column, expectations] of grouped.columns) {
      builder.markdown(TEMPLATE_NAMES.columnSection, { column: columnName(column) });
      for (const expectation of expectations) {
        builder.code(TEMPLATE_NAMES.columnExpectation, expectationParams(expectation), true);
      }
    }
  }
}

function expectationParams(expectation: Expectation): Record<string, unknown> {
  return {
    expectation,
    kwargs_string: buildKwargsString(expectation),
    meta_args: buildMetaArguments(expectation.meta)
  };
}

/** Accumulates the cells of a single render call. */
class CellBuilder {
  readonly cells: NotebookCell[] = [];

  constructor(
    private readonly templates: TemplateChain,
    private readonly lint: CodeLinter
  ) {}

  markdown(templateName: string, params: Record<string, unknown> = {}): void {
    this.cells.push(newMarkdownCell(this.templates.render(templateName, params)));
  }

  code(templateName: TemplateName, params: Record<string, unknown> = {}, lint = false): void {
    let source = this.templates.render(templateName, params);
    if (lint) {
      source = this.lint(source).replace(/\n+$/, '');
    }
    this.cells.push(newCodeCell(source));
  }
}

export interface CreateRendererOptions {
  /** Base for a relative `custom_templates_dir`; defaults to the working directory. */
  baseDir?: string;
  lint?: CodeLinter;
}

export function createSuiteEditNotebookRenderer(
  config: NotebookConfigInput = {},
  options: CreateRendererOptions = {}
): SuiteEditNotebookRenderer {
  const { custom_templates_dir, header_markdown } = loadNotebookConfig(config);
  return new SuiteEditNotebookRenderer({
    customTemplatesDir: custom_templates_dir
      ? path.resolve(options.baseDir ?? process.cwd(), custom_templates_dir)
      : undefined,
    headerMarkdown: header_markdown,
    lint: options.lint
  });
}

/** Builds the renderer from the `notebooks.suite_edit` section of a project config. */
export function fromProjectConfig(
  projectConfig: unknown,
  options: CreateRendererOptions = {}
): SuiteEditNotebookRenderer {
  return createSuiteEditNotebookRenderer(loadSuiteEditConfig(projectConfig), options);
}
