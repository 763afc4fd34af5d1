import type {
  Aggregate,
  GroupAggregate,
  GroupedAggregates,
  GroupingKey,
  RecordSet,
} from "@/lib/bench-types";
import {
  assertDimensions,
  assertField,
  compareKeys,
  encodeKey,
  keyOf,
} from "@/lib/grouping";

const ascending = (a: number, b: number) => a - b;

/**
 * Summarises a list of observations. Values are summed in ascending order
 * so the floating-point result does not depend on input order.
 */
export function summarize(values: readonly number[]): Aggregate | undefined {
  if (values.length === 0) return undefined;

  const sorted = [...values].sort(ascending);
  const count = sorted.length;
  const mean = sorted.reduce((sum, value) => sum + value, 0) / count;

  let std: number | undefined;
  if (count > 1) {
    const squared = sorted
      .map((value) => (value - mean) ** 2)
      .sort(ascending)
      .reduce((sum, value) => sum + value, 0);
    std = Math.sqrt(squared / (count - 1));
  }

  return Object.freeze({ mean, min: sorted[0], max: sorted[count - 1], std, count });
}

/** Groups valid values of `field` by the given dimension tuple. */
export function collectGroups(
  recordSet: RecordSet,
  dimensions: readonly string[],
  field: string,
): Map<string, { key: GroupingKey; values: number[] }> {
  const groups = new Map<string, { key: GroupingKey; values: number[] }>();

  for (const record of recordSet.records) {
    const value = record.values[field];
    if (value === null || value === undefined) continue;

    const key = keyOf(record, dimensions);
    const encoded = encodeKey(key);
    const group = groups.get(encoded);
    if (group) {
      group.values.push(value);
    } else {
      groups.set(encoded, { key, values: [value] });
    }
  }

  return groups;
}

export function aggregate(
  recordSet: RecordSet,
  groupByDimensions: readonly string[],
  numericField: string,
): GroupedAggregates {
  assertDimensions(recordSet, groupByDimensions, "aggregate");
  assertField(recordSet, numericField, "aggregate");

  const groups: GroupAggregate[] = [];
  for (const { key, values } of collectGroups(recordSet, groupByDimensions, numericField).values()) {
    const summary = summarize(values);
    if (summary) groups.push(Object.freeze({ key: Object.freeze([...key]), aggregate: summary }));
  }
  groups.sort((a, b) => compareKeys(a.key, b.key));

  return Object.freeze({
    dimensions: Object.freeze([...groupByDimensions]),
    field: numericField,
    groups: Object.freeze(groups),
  });
}

export function lookupAggregate(
  grouped: GroupedAggregates,
  key: GroupingKey,
): Aggregate | undefined {
  const encoded = encodeKey(key);
  return grouped.groups.find((group) => encodeKey(group.key) === encoded)?.aggregate;
}
