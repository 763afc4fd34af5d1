import type { BenchRecord, GroupingKey, RecordSet } from "@/lib/bench-types";
import { SchemaMismatchError } from "@/lib/errors";

const NUMERIC_KEY = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Plain UTF-16 code-unit order, independent of the host locale. */
export const compareCodeUnits = (a: string, b: string): number => (a === b ? 0 : a < b ? -1 : 1);

/**
 * Axis order for dimension values. Decimal-looking values (row counts,
 * sizes) come first, by numeric value and then by text; every other value
 * follows in code-unit order.
 */
export function compareDimensionValues(a: string, b: string): number {
  const aNumeric = NUMERIC_KEY.test(a);
  const bNumeric = NUMERIC_KEY.test(b);
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  if (aNumeric) {
    const x = Number(a);
    const y = Number(b);
    if (x < y) return -1;
    if (x > y) return 1;
  }
  return compareCodeUnits(a, b);
}

const compareTuples = (
  a: GroupingKey,
  b: GroupingKey,
  compare: (x: string, y: string) => number,
): number => {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compare(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
};

/** Display order of grouping keys, element by element. */
export const compareKeys = (a: GroupingKey, b: GroupingKey): number =>
  compareTuples(a, b, compareDimensionValues);

/** Lexicographic order of grouping keys, used to break ties between equal values. */
export const compareKeysLexicographically = (a: GroupingKey, b: GroupingKey): number =>
  compareTuples(a, b, compareCodeUnits);

export const encodeKey = (key: GroupingKey): string => JSON.stringify(key);

export const keyOf = (record: BenchRecord, dimensions: readonly string[]): GroupingKey =>
  dimensions.map((dimension) => record.dimensions[dimension] ?? "");

export function assertDimensions(
  recordSet: RecordSet,
  dimensions: readonly string[],
  context: string,
): void {
  const missing = dimensions.filter((dimension) => !recordSet.dimensionNames.includes(dimension));
  if (missing.length) throw new SchemaMismatchError(context, missing);
}

export function assertField(recordSet: RecordSet, field: string, context: string): void {
  if (!recordSet.numericFields.includes(field)) {
    throw new SchemaMismatchError(context, [field]);
  }
}

export type DimensionMatcher = readonly string[] | { prefix: string };

/** Dimension name → allowed values (or a required prefix). */
export type RecordFilter = Readonly<Record<string, DimensionMatcher>>;

export const matchesDimension = (value: string | undefined, matcher: DimensionMatcher): boolean => {
  if (value === undefined) return false;
  if ("prefix" in matcher) return value.startsWith(matcher.prefix);
  return matcher.includes(value);
};

export function filterRecords(recordSet: RecordSet, where: RecordFilter): RecordSet {
  const entries = Object.entries(where);
  assertDimensions(
    recordSet,
    entries.map(([dimension]) => dimension),
    "filter",
  );

  const records = recordSet.records.filter((record) =>
    entries.every(([dimension, matcher]) => matchesDimension(record.dimensions[dimension], matcher)),
  );

  return Object.freeze({
    dimensionNames: recordSet.dimensionNames,
    numericFields: recordSet.numericFields,
    records: Object.freeze(records),
  });
}
