import { describe, expect, it } from "vitest";
import type { RecordSchema } from "@/lib/bench-types";
import { SchemaMismatchError } from "@/lib/errors";
import { ingest } from "@/lib/ingest";
import { silentLogger } from "@/lib/logger";
import { cellAt, pivot, tableToMatrix } from "@/lib/pivot";

const schema: RecordSchema = {
  dimensions: ["impl", "metric"],
  numericFields: ["time"],
};

const recordSetOf = (rows: Record<string, unknown>[]) =>
  ingest([{ name: "rows", rows }], schema, { logger: silentLogger }).recordSet;

const rows = [
  { impl: "A", metric: "X", time: 10 },
  { impl: "A", metric: "Y", time: 20 },
  { impl: "B", metric: "X", time: 30 },
];

describe("pivot", () => {
  it("materializes observed pairs and marks the rest missing", () => {
    const table = pivot(recordSetOf(rows), "impl", "metric", "time");

    expect(table.rowKeys).toEqual(["A", "B"]);
    expect(table.columnKeys).toEqual(["X", "Y"]);
    expect(table.reducer).toBe("mean");
    expect(cellAt(table, "A", "X")).toMatchObject({ status: "observed", value: 10 });
    expect(cellAt(table, "A", "Y")).toMatchObject({ status: "observed", value: 20 });
    expect(cellAt(table, "B", "X")).toMatchObject({ status: "observed", value: 30 });
    expect(cellAt(table, "B", "Y")).toEqual({ status: "missing" });
    expect(cellAt(table, "C", "X")).toBeUndefined();
    expect(tableToMatrix(table)).toEqual([
      [10, 20],
      [30, null],
    ]);
  });

  it("orders axes independently of input order", () => {
    const forward = pivot(recordSetOf(rows), "impl", "metric", "time");
    const backward = pivot(recordSetOf([...rows].reverse()), "impl", "metric", "time");

    expect(backward).toEqual(forward);
  });

  it("orders mixed numeric and text axis values the same for any input order", () => {
    const orders = [
      ["2", "10", "1a"],
      ["10", "1a", "2"],
      ["1a", "2", "10"],
    ];

    for (const impls of orders) {
      const table = pivot(
        recordSetOf(impls.map((impl) => ({ impl, metric: "SELECT", time: 5 }))),
        "impl",
        "metric",
        "time",
      );
      expect(table.rowKeys).toEqual(["2", "10", "1a"]);
    }
  });

  it("averages repeated observations and applies other reducers", () => {
    const recordSet = recordSetOf([
      { impl: "A", metric: "X", time: 1 },
      { impl: "A", metric: "X", time: 4 },
      { impl: "A", metric: "X", time: 7 },
      { impl: "A", metric: "Y", time: 2 },
    ]);

    expect(tableToMatrix(pivot(recordSet, "impl", "metric", "time"))).toEqual([[4, 2]]);
    expect(tableToMatrix(pivot(recordSet, "impl", "metric", "time", "max"))).toEqual([[7, 2]]);
    expect(tableToMatrix(pivot(recordSet, "impl", "metric", "time", "count"))).toEqual([[3, 1]]);

    function spread(values: readonly number[]) {
      return values[values.length - 1] - values[0];
    }
    const custom = pivot(recordSet, "impl", "metric", "time", spread);
    expect(custom.reducer).toBe("spread");
    expect(tableToMatrix(custom)).toEqual([[6, 0]]);
  });

  it("keeps a single-observation std cell observed but undefined", () => {
    const table = pivot(recordSetOf(rows), "impl", "metric", "time", "std");

    expect(cellAt(table, "A", "X")).toMatchObject({ status: "observed", value: undefined });
    expect(tableToMatrix(table)).toEqual([
      [null, null],
      [null, null],
    ]);
  });

  it("leaves out axis values that only carry invalid measurements", () => {
    const table = pivot(
      recordSetOf([...rows, { impl: "C", metric: "Z", time: "error" }]),
      "impl",
      "metric",
      "time",
    );

    expect(table.rowKeys).toEqual(["A", "B"]);
    expect(table.columnKeys).toEqual(["X", "Y"]);
  });

  it("never contains rows dropped at ingestion", () => {
    const { recordSet, stats } = ingest(
      [
        {
          name: "summary",
          text: "Best_Implementation,Metric,Average_Time_ms\nping__int,SELECT,1\nonlyonepart,SELECT,2",
        },
      ],
      {
        dimensions: ["Metric"],
        composites: [{ column: "Best_Implementation", parts: ["Implementation", "DataType"] }],
        numericFields: ["Average_Time_ms"],
      },
      { logger: silentLogger },
    );

    const table = pivot(recordSet, "Implementation", "Metric", "Average_Time_ms");

    expect(stats.droppedRows).toBe(1);
    expect(table.rowKeys).toEqual(["ping"]);
    expect(tableToMatrix(table)).toEqual([[1]]);
  });

  it("rejects unknown dimensions", () => {
    expect(() => pivot(recordSetOf(rows), "impl", "datatype", "time")).toThrow(SchemaMismatchError);
  });
});
