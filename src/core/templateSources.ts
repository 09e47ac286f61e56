import { existsSync, statSync } from 'node:fs';
import path from 'node:path';

import nunjucks, {
  type Callback,
  type Environment,
  type FileSystemLoader,
  type ILoaderAsync,
  type LoaderSource
} from 'nunjucks';

import { TemplateNotFoundError, TemplateSourceNotFoundError } from './errors.js';
import { defaultTemplates } from './templates.js';

/**
 * A nunjucks loader with a name for error messages. Sources call back
 * synchronously with `null` for templates they do not have, so the next
 * source is tried and synchronous rendering still works.
 */
export interface TemplateSource extends ILoaderAsync {
  readonly description: string;
}

export class BuiltinTemplateSource extends nunjucks.Loader implements TemplateSource {
  readonly async = true;
  readonly description = 'built-in suite edit templates';
  private readonly templates: ReadonlyMap<string, string>;

  constructor(templates: Record<string, string> = defaultTemplates) {
    super();
    this.templates = new Map(Object.entries(templates));
  }

  getSource(name: string, callback: Callback<Error, LoaderSource>): void {
    const src = this.templates.get(name);
    callback(null, src === undefined ? null : { src, path: `builtin/${name}`, noCache: false });
  }
}

/** Templates read from a directory, one file per template name. */
export class DirectoryTemplateSource extends nunjucks.Loader implements TemplateSource {
  readonly async = true;
  readonly description: string;
  readonly directory: string;
  private readonly files: FileSystemLoader;

  constructor(directory: string) {
    super();
    if (!existsSync(directory) || !statSync(directory).isDirectory()) {
      throw new TemplateSourceNotFoundError(directory);
    }
    this.directory = directory;
    this.description = `templates in ${directory}`;
    this.files = new nunjucks.FileSystemLoader(directory);
  }

  getSource(name: string, callback: Callback<Error, LoaderSource>): void {
    const filePath = path.resolve(this.directory, name);
    if (existsSync(filePath) && statSync(filePath).isDirectory()) {
      callback(null, null);
      return;
    }

    let source: LoaderSource | null;
    try {
      source = this.files.getSource(name);
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)), null);
      return;
    }

    // Jinja drops a single trailing newline from template files
    callback(null, source ? { ...source, src: source.src.replace(/\r?\n$/, '') } : null);
  }
}

/** Renders named templates from the first source that has them. */
export class TemplateChain {
  private readonly env: Environment;

  constructor(readonly sources: readonly TemplateSource[]) {
    this.env = new nunjucks.Environment([...sources], { autoescape: false });
  }

  render(name: string, context: Record<string, unknown> = {}): string {
    try {
      return this.env.render(name, context);
    } catch (err) {
      if (err instanceof Error && err.message === `template not found: ${name}`) {
        throw new TemplateNotFoundError(
          name,
          this.sources.map((source) => source.description)
        );
      }
      throw err;
    }
  }
}

export function createTemplateChain(customTemplatesDir?: string): TemplateChain {
  const sources: TemplateSource[] = [];
  if (customTemplatesDir) {
    sources.push(new DirectoryTemplateSource(customTemplatesDir));
  }
  sources.push(new BuiltinTemplateSource());
  return new TemplateChain(sources);
}
