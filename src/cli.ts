#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { generateNotebook } from './generateNotebook.js';
import { jsonObjectSchema, readExpectationSuite } from './core/suite.js';

interface CliArguments {
  suitePath: string;
  notebookPath: string;
  configPath: string;
  batchKwargs: string;
}

function parseArguments(argv: string[]): CliArguments {
  const args = { suitePath: '', notebookPath: '', configPath: '', batchKwargs: '' };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    switch (current) {
      case '--suite':
      case '-s':
        args.suitePath = argv[++i] ?? '';
        break;
      case '--out':
      case '-o':
        args.notebookPath = argv[++i] ?? '';
        break;
      case '--config':
      case '-c':
        args.configPath = argv[++i] ?? '';
        break;
      case '--batch-kwargs':
        args.batchKwargs = argv[++i] ?? '';
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        if (current.startsWith('-')) {
          throw new Error(`Unknown option: ${current}`);
        }
    }
  }

  if (!args.suitePath) {
    throw new Error('Missing required --suite <path> argument.');
  }

  if (!args.notebookPath) {
    throw new Error('Missing required --out <notebook.ipynb> argument.');
  }

  return args;
}

function printUsage(): void {
  const message = `
Suite Edit Notebook CLI

Usage:
  suite-notebook --suite <suite.json> --out <notebook.ipynb> [--config <project.json>] [--batch-kwargs <json>]

Options:
  -s, --suite       Path to an expectation suite JSON file (required)
  -o, --out         Path of the notebook to write (required)
  -c, --config      Project config JSON with an optional notebooks.suite_edit section
  --batch-kwargs    Batch kwargs as JSON; overrides those cited in the suite
  -h, --help        Show this help message
`.trim();
  console.log(message);
}

async function main() {
  try {
    const args = parseArguments(process.argv.slice(2));
    const suite = await readExpectationSuite(path.resolve(process.cwd(), args.suitePath));

    let projectConfig: unknown;
    let projectRoot: string | undefined;
    if (args.configPath) {
      const resolvedConfigPath = path.resolve(process.cwd(), args.configPath);
      projectConfig = JSON.parse(await readFile(resolvedConfigPath, 'utf8'));
      projectRoot = path.dirname(resolvedConfigPath);
    }

    const batchKwargs = args.batchKwargs ? jsonObjectSchema.parse(JSON.parse(args.batchKwargs)) : undefined;

    const result = await generateNotebook(suite, {
      notebookPath: path.resolve(process.cwd(), args.notebookPath),
      projectConfig,
      projectRoot,
      batchKwargs
    });

    console.log(
      [
        `Generated notebook for suite "${result.suiteName}":`,
        `- Notebook:     ${path.relative(process.cwd(), result.notebookPath)}`,
        `- Expectations: ${result.expectationCount}`,
        `- Cells:        ${result.cellCount}`
      ].join('\n')
    );
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

void main();
