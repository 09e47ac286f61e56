import { describe, expect, test } from 'vitest';

import { lintCode } from '../../src/core/lint.js';
import { newCodeCell, newMarkdownCell, newNotebook, serializeNotebook, splitLines } from '../../src/core/notebook.js';

describe('splitLines', () => {
  test('keeps newlines on every line but the last', () => {
    expect(splitLines('a\n\nb')).toEqual(['a\n', '\n', 'b']);
    expect(splitLines('a\n')).toEqual(['a\n']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('newNotebook', () => {
  test('freezes the notebook and its cells', () => {
    const notebook = newNotebook([newMarkdownCell('# Title')]);

    expect(Object.isFrozen(notebook)).toBe(true);
    expect(Object.isFrozen(notebook.cells)).toBe(true);
    expect(Object.isFrozen(notebook.cells[0])).toBe(true);
  });
});

describe('serializeNotebook', () => {
  test('writes nbformat 4 JSON with line-split sources', () => {
    const notebook = newNotebook([newMarkdownCell('# Title\nbody'), newCodeCell('x = 1')]);
    const raw = serializeNotebook(notebook);

    expect(raw.endsWith('}\n')).toBe(true);
    expect(JSON.parse(raw)).toEqual({
      cells: [
        { cell_type: 'markdown', metadata: {}, source: ['# Title\n', 'body'] },
        { cell_type: 'code', metadata: {}, execution_count: null, outputs: [], source: ['x = 1'] }
      ],
      metadata: {},
      nbformat: 4,
      nbformat_minor: 4
    });
  });
});

describe('lintCode', () => {
  test('strips trailing whitespace and trailing blank lines', () => {
    expect(lintCode('x = 1   \n\n\n\n\ny = 2\n\n')).toBe('x = 1\n\n\ny = 2');
  });
});
