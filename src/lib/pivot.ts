import type {
  Aggregate,
  ComparisonTable,
  PivotCell,
  RecordSet,
  Reducer,
} from "@/lib/bench-types";
import { collectGroups, summarize } from "@/lib/aggregate";
import {
  assertDimensions,
  assertField,
  compareDimensionValues,
  encodeKey,
} from "@/lib/grouping";

export const reducerName = (reducer: Reducer): string =>
  typeof reducer === "function" ? reducer.name || "custom" : reducer;

export function reduceCell(
  reducer: Reducer,
  aggregate: Aggregate,
  values: readonly number[],
): number | undefined {
  if (typeof reducer === "function") {
    return reducer([...values].sort((a, b) => a - b));
  }
  return aggregate[reducer];
}

const MISSING: PivotCell = Object.freeze({ status: "missing" });

/**
 * Cross-tabulates `numericField` over two dimensions. Only row and column
 * values that carry at least one valid observation become axes, and a pair
 * with no observations is `missing` rather than 0.
 */
export function pivot(
  recordSet: RecordSet,
  rowDimension: string,
  columnDimension: string,
  numericField: string,
  reducer: Reducer = "mean",
): ComparisonTable {
  assertDimensions(recordSet, [rowDimension, columnDimension], "pivot");
  assertField(recordSet, numericField, "pivot");

  const groups = collectGroups(recordSet, [rowDimension, columnDimension], numericField);
  const rows = new Set<string>();
  const columns = new Set<string>();
  for (const { key } of groups.values()) {
    rows.add(key[0]);
    columns.add(key[1]);
  }

  const rowKeys = [...rows].sort(compareDimensionValues);
  const columnKeys = [...columns].sort(compareDimensionValues);

  const cells = rowKeys.map((row) =>
    Object.freeze(
      columnKeys.map((column): PivotCell => {
        const group = groups.get(encodeKey([row, column]));
        const aggregate = group && summarize(group.values);
        if (!group || !aggregate) return MISSING;
        return Object.freeze({
          status: "observed",
          value: reduceCell(reducer, aggregate, group.values),
          aggregate,
        });
      }),
    ),
  );

  return Object.freeze({
    rowDimension,
    columnDimension,
    field: numericField,
    reducer: reducerName(reducer),
    rowKeys: Object.freeze(rowKeys),
    columnKeys: Object.freeze(columnKeys),
    cells: Object.freeze(cells),
  });
}

export function cellAt(table: ComparisonTable, row: string, column: string): PivotCell | undefined {
  const rowIndex = table.rowKeys.indexOf(row);
  const columnIndex = table.columnKeys.indexOf(column);
  if (rowIndex < 0 || columnIndex < 0) return undefined;
  return table.cells[rowIndex][columnIndex];
}

/** Dense numeric grid for renderers; `null` marks a missing or undefined cell. */
export function tableToMatrix(table: ComparisonTable): (number | null)[][] {
  return table.cells.map((row) =>
    row.map((cell) => (cell.status === "observed" && cell.value !== undefined ? cell.value : null)),
  );
}
