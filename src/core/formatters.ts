import type { Expectation, JsonObject, JsonValue } from './suite.js';

/** Meta key written by the automated profiler; never shown in the notebook. */
export const PROFILER_META_KEY = 'BasicSuiteBuilderProfiler';

/**
 * Python literal text for a JSON value, matching what `repr` prints for the
 * equivalent Python object.
 */
export function toPythonLiteral(value: JsonValue): string {
  if (value === null) {
    return 'None';
  }
  if (typeof value === 'boolean') {
    return value ? 'True' : 'False';
  }
  if (typeof value === 'number') {
    return formatNumber(value);
  }
  if (typeof value === 'string') {
    return quotePythonString(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(toPythonLiteral).join(', ')}]`;
  }
  const entries = Object.entries(value).map(
    ([key, entry]) => `${quotePythonString(key)}: ${toPythonLiteral(entry)}`
  );
  return `{${entries.join(', ')}}`;
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return "float('nan')";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "float('inf')" : "float('-inf')";
  }
  // parsed JSON numbers are doubles: `1.0` prints as `1`, integers past 2^53 lose digits
  return String(value);
}

export function quotePythonString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let escaped = '';
  for (const char of value) {
    switch (char) {
      case '\\':
        escaped += '\\\\';
        break;
      case '\n':
        escaped += '\\n';
        break;
      case '\r':
        escaped += '\\r';
        break;
      case '\t':
        escaped += '\\t';
        break;
      default:
        escaped += char === quote ? `\\${char}` : char;
    }
  }
  return `${quote}${escaped}${quote}`;
}

/**
 * Argument list for the expectation call, e.g. `'age', min_value=0, strict=True`.
 * The column is hoisted to a positional first argument; top-level strings are
 * wrapped in single quotes as-is.
 */
export function buildKwargsString(expectation: Pick<Expectation, 'kwargs'>): string {
  const positional: string[] = [];
  const named: string[] = [];

  for (const [key, value] of Object.entries(expectation.kwargs)) {
    if (key === 'column') {
      positional.push(`'${columnName(value)}'`);
    } else if (typeof value === 'string') {
      named.push(`${key}='${value}'`);
    } else {
      named.push(`${key}=${toPythonLiteral(value)}`);
    }
  }

  return [...positional, ...named].join(', ');
}

/** Text form of a `column` kwarg, used in the call and in the column heading. */
export function columnName(value: JsonValue): string {
  return typeof value === 'string' ? value : toPythonLiteral(value);
}

export function buildMetaArguments(meta: JsonObject | undefined): string {
  if (!meta) {
    return '';
  }

  const visible = Object.entries(meta).filter(([key]) => key !== PROFILER_META_KEY);
  if (visible.length === 0) {
    return '';
  }

  return `, meta=${toPythonLiteral(Object.fromEntries(visible))}`;
}
