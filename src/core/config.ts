import { z } from 'zod';

import { ConfigValidationError, describeIssues } from './errors.js';
import { jsonObjectSchema } from './suite.js';

export const headerMarkdownSchema = z.object({
  file_name: z.string().min(1),
  template_kwargs: jsonObjectSchema.default({})
});

export const notebookConfigSchema = z
  .object({
    custom_templates_dir: z.string().min(1).optional(),
    header_markdown: headerMarkdownSchema.optional()
  })
  .strict();

export type HeaderMarkdownConfig = z.infer<typeof headerMarkdownSchema>;
export type NotebookConfig = z.infer<typeof notebookConfigSchema>;
export type NotebookConfigInput = z.input<typeof notebookConfigSchema>;

export const projectConfigSchema = z
  .object({
    notebooks: z
      .object({
        suite_edit: notebookConfigSchema.nullable().optional()
      })
      .passthrough()
      .nullable()
      .optional()
  })
  .passthrough();

export type ProjectConfig = z.input<typeof projectConfigSchema>;

export function loadNotebookConfig(raw: unknown): NotebookConfig {
  const parsed = notebookConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigValidationError(describeIssues(parsed.error.issues, 'config'));
  }
  return parsed.data;
}

/** The `notebooks.suite_edit` section of a project config, or defaults. */
export function loadSuiteEditConfig(projectConfig: unknown): NotebookConfig {
  const parsed = projectConfigSchema.safeParse(projectConfig ?? {});
  if (!parsed.success) {
    throw new ConfigValidationError(describeIssues(parsed.error.issues, 'config'));
  }
  return parsed.data.notebooks?.suite_edit ?? {};
}
