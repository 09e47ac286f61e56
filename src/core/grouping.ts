import { toPythonLiteral } from './formatters.js';
import type { Expectation, JsonValue } from './suite.js';

export interface GroupedExpectations {
  table: Expectation[];
  /**
   * Keyed by the column value as written in the suite, in the order each
   * column first appears. `1` and `"1"` are different columns.
   */
  columns: Map<JsonValue, Expectation[]>;
}

export function groupExpectationsByColumn(expectations: readonly Expectation[]): GroupedExpectations {
  const grouped: GroupedExpectations = { table: [], columns: new Map() };

  for (const expectation of expectations) {
    if (!Object.prototype.hasOwnProperty.call(expectation.kwargs, 'column')) {
      grouped.table.push(expectation);
      continue;
    }

    const column = columnKey(grouped.columns, expectation.kwargs.column ?? null);
    const bucket = grouped.columns.get(column);
    if (bucket) {
      bucket.push(expectation);
    } else {
      grouped.columns.set(column, [expectation]);
    }
  }

  return grouped;
}

// lists and mappings compare by value, not identity
function columnKey(columns: ReadonlyMap<JsonValue, Expectation[]>, value: JsonValue): JsonValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  const literal = toPythonLiteral(value);
  for (const key of columns.keys()) {
    if (key !== null && typeof key === 'object' && toPythonLiteral(key) === literal) {
      return key;
    }
  }
  return value;
}
