export {
  generateNotebook,
  type GenerateNotebookOptions,
  type GenerationResult
} from './generateNotebook.js';
export {
  SuiteEditNotebookRenderer,
  createSuiteEditNotebookRenderer,
  fromProjectConfig,
  type RendererOptions,
  type CreateRendererOptions
} from './core/renderer.js';
export { resolveBatchKwargs, fixPathInBatchKwargs } from './core/batchKwargs.js';
export {
  buildKwargsString,
  buildMetaArguments,
  toPythonLiteral,
  PROFILER_META_KEY
} from './core/formatters.js';
export { groupExpectationsByColumn, type GroupedExpectations } from './core/grouping.js';
export { lintCode, type CodeLinter } from './core/lint.js';
export {
  serializeNotebook,
  writeNotebook,
  type Notebook,
  type NotebookCell,
  type MarkdownCell,
  type CodeCell
} from './core/notebook.js';
export {
  loadNotebookConfig,
  loadSuiteEditConfig,
  notebookConfigSchema,
  type NotebookConfig,
  type HeaderMarkdownConfig,
  type ProjectConfig
} from './core/config.js';
export {
  expectationSuiteSchema,
  getCitations,
  parseExpectationSuite,
  readExpectationSuite,
  type BatchKwargs,
  type Citation,
  type Expectation,
  type ExpectationSuite,
  type ExpectationSuiteInput,
  type JsonObject,
  type JsonValue
} from './core/suite.js';
export {
  BuiltinTemplateSource,
  DirectoryTemplateSource,
  TemplateChain,
  type TemplateSource
} from './core/templateSources.js';
export { TEMPLATE_NAMES, defaultTemplates, type TemplateName } from './core/templates.js';
export {
  ConfigValidationError,
  InvalidSuiteError,
  TemplateNotFoundError,
  TemplateSourceNotFoundError
} from './core/errors.js';
