import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LoaderSource } from 'nunjucks';
import { describe, expect, test } from 'vitest';

import { TemplateNotFoundError, TemplateSourceNotFoundError } from '../../src/core/errors.js';
import {
  BuiltinTemplateSource,
  DirectoryTemplateSource,
  TemplateChain,
  createTemplateChain,
  type TemplateSource
} from '../../src/core/templateSources.js';
import { defaultTemplates } from '../../src/core/templates.js';

const customTemplatesDir = fileURLToPath(new URL('../fixtures/custom_templates', import.meta.url));

function loadSource(source: TemplateSource, name: string): string | undefined {
  const result: { source: LoaderSource | null } = { source: null };
  source.getSource(name, (err, loaded) => {
    if (err) {
      throw err;
    }
    result.source = loaded;
  });
  return result.source?.src;
}

describe('DirectoryTemplateSource', () => {
  test('fails for a missing directory', () => {
    const missing = path.join(customTemplatesDir, 'does-not-exist');

    expect(() => new DirectoryTemplateSource(missing)).toThrow(TemplateSourceNotFoundError);
  });

  test('drops the trailing newline of template files', () => {
    const source = new DirectoryTemplateSource(customTemplatesDir);

    expect(loadSource(source, 'HEADER.md')).toBe('# Custom header for {{ suite_name }}');
  });

  test('does not look outside its directory', () => {
    const source = new DirectoryTemplateSource(customTemplatesDir);

    expect(loadSource(source, '../project_config.json')).toBeUndefined();
    expect(loadSource(source, 'FOOTER.md')).toBeUndefined();
  });

  test('treats a subdirectory name as a missing template', () => {
    const source = new DirectoryTemplateSource(customTemplatesDir);

    expect(loadSource(source, 'partials')).toBeUndefined();
    expect(loadSource(source, 'partials/suite_name.md')).toBe('`{{ suite_name }}`');
  });
});

describe('TemplateChain', () => {
  test('uses the first source that has a template', () => {
    const chain = createTemplateChain(customTemplatesDir);

    expect(chain.render('HEADER.md', { suite_name: 'orders' })).toBe('# Custom header for orders');
    expect(chain.render('AUTHORING_INTRO.md')).toBe(defaultTemplates['AUTHORING_INTRO.md']);
  });

  test('falls back to the built-in templates', () => {
    const chain = createTemplateChain();

    expect(chain.sources).toHaveLength(1);
    expect(chain.render('COLUMN_EXPECTATIONS.md', { column: 'id' })).toBe('#### `id`');
  });

  test('resolves includes across custom and built-in templates', () => {
    const chain = createTemplateChain(customTemplatesDir);

    expect(chain.render('WELCOME.md', { suite_name: 'orders' })).toBe(
      'Welcome to `orders`.\n\n' + defaultTemplates['AUTHORING_INTRO.md']
    );
  });

  test('does not escape rendered values', () => {
    const chain = new TemplateChain([new BuiltinTemplateSource({ 'call.py': 'f({{ args }})' })]);

    expect(chain.render('call.py', { args: "'a', b=\"<c>\"" })).toBe("f('a', b=\"<c>\")");
  });

  test('fails for an unknown template', () => {
    const chain = createTemplateChain();

    expect(() => chain.render('MISSING.md')).toThrow(TemplateNotFoundError);
    expect(() => chain.render('MISSING.md')).toThrow(
      'Template not found: MISSING.md (searched built-in suite edit templates)'
    );
  });

  test('fails for a directory name that no source has as a template', () => {
    const chain = createTemplateChain(customTemplatesDir);

    expect(() => chain.render('partials')).toThrow(TemplateNotFoundError);
  });
});
