import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { describeIssues, InvalidSuiteError } from './errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const expectationSchema = z.object({
  expectation_type: z.string().min(1),
  kwargs: jsonObjectSchema.default({}),
  meta: jsonObjectSchema.optional()
});

export const citationSchema = z
  .object({
    citation_date: z.string().optional(),
    batch_kwargs: jsonObjectSchema.nullable().optional(),
    batch_markers: jsonObjectSchema.nullable().optional(),
    batch_parameters: jsonObjectSchema.nullable().optional(),
    comment: z.string().nullable().optional()
  })
  .passthrough();

export const expectationSuiteSchema = z.object({
  expectation_suite_name: z.string().min(1),
  expectations: z.array(expectationSchema).default([]),
  meta: z
    .object({
      citations: z.array(citationSchema).optional()
    })
    .passthrough()
    .default({}),
  data_asset_type: z.string().nullable().optional()
});

export type Expectation = z.infer<typeof expectationSchema>;
export type Citation = z.infer<typeof citationSchema>;
export type ExpectationSuite = z.infer<typeof expectationSuiteSchema>;
export type ExpectationSuiteInput = z.input<typeof expectationSuiteSchema>;
export type BatchKwargs = JsonObject;

export function parseExpectationSuite(value: unknown): ExpectationSuite {
  const parsed = expectationSuiteSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidSuiteError(describeIssues(parsed.error.issues, 'suite'));
  }
  return parsed.data;
}

export async function readExpectationSuite(filePath: string): Promise<ExpectationSuite> {
  const raw = await readFile(filePath, 'utf8');
  return parseExpectationSuite(JSON.parse(raw));
}

export interface GetCitationsOptions {
  sort?: boolean;
  requireBatchKwargs?: boolean;
}

/**
 * Citations recorded in the suite meta, oldest first when sorted.
 * Entries without a `citation_date` sort ahead of dated ones.
 */
export function getCitations(suite: ExpectationSuite, options: GetCitationsOptions = {}): Citation[] {
  const { sort = true, requireBatchKwargs = false } = options;
  let citations = suite.meta.citations ?? [];

  if (requireBatchKwargs) {
    citations = citations.filter(
      (citation) => citation.batch_kwargs != null && Object.keys(citation.batch_kwargs).length > 0
    );
  }
  if (!sort) {
    return [...citations];
  }
  return [...citations].sort((a, b) => compareDates(a.citation_date ?? '', b.citation_date ?? ''));
}

function compareDates(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
