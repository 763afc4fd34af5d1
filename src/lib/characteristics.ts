import type { ComparisonTable, PivotCell, RecordSet, Reducer } from "@/lib/bench-types";
import { summarize } from "@/lib/aggregate";
import { InvalidPlanError } from "@/lib/errors";
import {
  assertDimensions,
  assertField,
  compareDimensionValues,
  matchesDimension,
} from "@/lib/grouping";
import type { DimensionMatcher } from "@/lib/grouping";
import { reduceCell, reducerName } from "@/lib/pivot";

export interface CharacteristicCategory {
  label: string;
  /** Values (or prefix) of the category dimension; every record when omitted. */
  match?: DimensionMatcher;
  reducer?: Reducer;
}

export interface CharacteristicsSpec {
  rowDimension: string;
  categoryDimension: string;
  field: string;
  categories: CharacteristicCategory[];
}

export const CHARACTERISTIC_COLUMN = "characteristic";

/**
 * One row per value of `rowDimension`, one column per declared category, in
 * declared order. Categories without observations for a row stay missing.
 */
export function profileCharacteristics(
  recordSet: RecordSet,
  spec: CharacteristicsSpec,
): ComparisonTable {
  assertDimensions(recordSet, [spec.rowDimension, spec.categoryDimension], "profile");
  assertField(recordSet, spec.field, "profile");
  const labels = spec.categories.map((category) => category.label);
  if (new Set(labels).size !== labels.length) {
    throw new InvalidPlanError("profile", "category labels must be unique");
  }

  const byRow = new Map<string, { category: string | undefined; value: number }[]>();
  for (const record of recordSet.records) {
    const value = record.values[spec.field];
    const row = record.dimensions[spec.rowDimension];
    if (value === null || value === undefined || row === undefined) continue;
    const bucket = byRow.get(row) ?? [];
    bucket.push({ category: record.dimensions[spec.categoryDimension], value });
    byRow.set(row, bucket);
  }

  const rowKeys = [...byRow.keys()].sort(compareDimensionValues);
  const cells = rowKeys.map((row) =>
    Object.freeze(
      spec.categories.map((category): PivotCell => {
        const values = (byRow.get(row) ?? [])
          .filter(
            (observation) =>
              !category.match || matchesDimension(observation.category, category.match),
          )
          .map((observation) => observation.value);
        const aggregate = summarize(values);
        if (!aggregate) return { status: "missing" };
        return {
          status: "observed",
          value: reduceCell(category.reducer ?? "mean", aggregate, values),
          aggregate,
        };
      }),
    ),
  );

  const reducers = new Set(spec.categories.map((category) => reducerName(category.reducer ?? "mean")));

  return Object.freeze({
    rowDimension: spec.rowDimension,
    columnDimension: CHARACTERISTIC_COLUMN,
    field: spec.field,
    reducer: reducers.size === 1 ? [...reducers][0] : "mixed",
    rowKeys: Object.freeze(rowKeys),
    columnKeys: Object.freeze(labels),
    cells: Object.freeze(cells),
  });
}
