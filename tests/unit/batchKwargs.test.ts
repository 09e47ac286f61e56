import { describe, expect, test } from 'vitest';

import { fixPathInBatchKwargs, resolveBatchKwargs } from '../../src/core/batchKwargs.js';
import { parseExpectationSuite, type Citation } from '../../src/core/suite.js';

const suiteWithCitations = (citations?: Citation[]) =>
  parseExpectationSuite({
    expectation_suite_name: 'warehouse.orders',
    expectations: [],
    meta: citations ? { citations } : {}
  });

describe('fixPathInBatchKwargs', () => {
  test('points relative paths two directories up', () => {
    expect(fixPathInBatchKwargs({ path: 'data/file.csv' })).toEqual({ path: '../../data/file.csv' });
  });

  test('leaves absolute paths untouched', () => {
    expect(fixPathInBatchKwargs({ path: '/abs/file.csv' })).toEqual({ path: '/abs/file.csv' });
  });

  test('returns a copy', () => {
    const batchKwargs = { path: 'data/file.csv', datasource: 'files' };
    const fixed = fixPathInBatchKwargs(batchKwargs);

    expect(fixed).not.toBe(batchKwargs);
    expect(batchKwargs.path).toBe('data/file.csv');
  });

  test('keeps kwargs without a path as they are', () => {
    expect(fixPathInBatchKwargs({ table: 'orders', datasource: 'warehouse' })).toEqual({
      table: 'orders',
      datasource: 'warehouse'
    });
  });

  test('passes through missing kwargs', () => {
    expect(fixPathInBatchKwargs(undefined)).toBeUndefined();
    expect(fixPathInBatchKwargs(null)).toBeUndefined();
  });
});

describe('resolveBatchKwargs', () => {
  const citations: Citation[] = [
    { citation_date: '2026-05-01T00:00:00Z', batch_kwargs: { path: 'data/may.csv' } },
    { citation_date: '2026-02-01T00:00:00Z', batch_kwargs: { path: 'data/february.csv' } },
    { citation_date: '2026-06-01T00:00:00Z', comment: 'profiled without batch kwargs' }
  ];

  test('prefers explicit batch kwargs over citations', () => {
    expect(resolveBatchKwargs(suiteWithCitations(citations), { path: 'data/override.csv' })).toEqual({
      path: '../../data/override.csv'
    });
  });

  test('uses the most recent citation that has batch kwargs', () => {
    expect(resolveBatchKwargs(suiteWithCitations(citations))).toEqual({ path: '../../data/may.csv' });
  });

  test('is undefined when no citation carries batch kwargs', () => {
    expect(resolveBatchKwargs(suiteWithCitations([{ citation_date: '2026-01-01', batch_kwargs: null }]))).toBeUndefined();
  });

  test('skips a newer citation whose batch kwargs are empty', () => {
    const suite = suiteWithCitations([
      { citation_date: '2026-01-01T00:00:00Z', batch_kwargs: { path: 'data/a.csv' } },
      { citation_date: '2026-03-01T00:00:00Z', batch_kwargs: {} }
    ]);

    expect(resolveBatchKwargs(suite)).toEqual({ path: '../../data/a.csv' });
  });

  test('is undefined without citations or explicit kwargs', () => {
    expect(resolveBatchKwargs(suiteWithCitations())).toBeUndefined();
    expect(resolveBatchKwargs(suiteWithCitations([]))).toBeUndefined();
  });

  test('does not touch the cited kwargs', () => {
    const suite = suiteWithCitations(citations);
    resolveBatchKwargs(suite);

    expect(suite.meta.citations?.[0]?.batch_kwargs).toEqual({ path: 'data/may.csv' });
  });
});
