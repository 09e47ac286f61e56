import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

export type CellMetadata = Record<string, unknown>;

export interface MarkdownCell {
  cell_type: 'markdown';
  metadata: CellMetadata;
  source: string;
}

export interface CodeCell {
  cell_type: 'code';
  metadata: CellMetadata;
  execution_count: null;
  outputs: [];
  source: string;
}

export type NotebookCell = MarkdownCell | CodeCell;

export interface Notebook {
  nbformat: 4;
  nbformat_minor: 4;
  metadata: Record<string, unknown>;
  cells: readonly NotebookCell[];
}

export function newMarkdownCell(source: string): MarkdownCell {
  return { cell_type: 'markdown', metadata: {}, source };
}

export function newCodeCell(source: string): CodeCell {
  return { cell_type: 'code', metadata: {}, execution_count: null, outputs: [], source };
}

export function newNotebook(cells: NotebookCell[]): Notebook {
  const notebook: Notebook = {
    nbformat: 4,
    nbformat_minor: 4,
    metadata: {},
    cells: Object.freeze(cells.map((cell) => Object.freeze(cell)))
  };
  return Object.freeze(notebook);
}

/** Splits text into nbformat's list-of-lines form, keeping each newline. */
export function splitLines(source: string): string[] {
  return source.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function serializeNotebook(notebook: Notebook): string {
  const onDisk = {
    cells: notebook.cells.map((cell) => ({ ...cell, source: splitLines(cell.source) })),
    metadata: notebook.metadata,
    nbformat: notebook.nbformat,
    nbformat_minor: notebook.nbformat_minor
  };
  return `${JSON.stringify(onDisk, null, 1)}\n`;
}

export async function writeNotebook(notebook: Notebook, notebookPath: string): Promise<void> {
  await mkdir(path.dirname(notebookPath), { recursive: true });
  await writeFile(notebookPath, serializeNotebook(notebook), 'utf8');
}
