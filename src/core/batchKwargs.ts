import path from 'node:path';

import { getCitations, type BatchKwargs, type ExpectationSuite } from './suite.js';

/**
 * Batch kwargs for the notebook header. Explicit kwargs win; otherwise the
 * most recent citation that carries batch kwargs is used.
 */
export function resolveBatchKwargs(
  suite: ExpectationSuite,
  batchKwargs?: BatchKwargs | null
): BatchKwargs | undefined {
  if (batchKwargs) {
    return fixPathInBatchKwargs(batchKwargs);
  }

  if (!suite.meta.citations || suite.meta.citations.length === 0) {
    return fixPathInBatchKwargs(batchKwargs);
  }

  const citations = getCitations(suite, { requireBatchKwargs: true });
  const latest = citations.at(-1);
  if (!latest?.batch_kwargs) {
    return undefined;
  }

  return fixPathInBatchKwargs(latest.batch_kwargs);
}

/**
 * Copies the kwargs, pointing a relative `path` two directories up. Edit
 * notebooks live two levels below the root that stored paths are relative to.
 */
export function fixPathInBatchKwargs(batchKwargs: BatchKwargs | null | undefined): BatchKwargs | undefined {
  if (!batchKwargs) {
    return undefined;
  }

  const fixed: BatchKwargs = { ...batchKwargs };
  const dataPath = fixed.path;
  if (typeof dataPath === 'string' && !path.isAbsolute(dataPath)) {
    fixed.path = path.join('..', '..', dataPath);
  }

  return fixed;
}
