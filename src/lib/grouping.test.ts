import { describe, expect, it } from "vitest";
import { SchemaMismatchError } from "@/lib/errors";
import {
  compareDimensionValues,
  compareKeys,
  compareKeysLexicographically,
  filterRecords,
} from "@/lib/grouping";
import { ingest } from "@/lib/ingest";
import { silentLogger } from "@/lib/logger";

describe("compareDimensionValues", () => {
  it("orders numeric values numerically and the rest by code unit", () => {
    expect(["10000", "500", "1000"].sort(compareDimensionValues)).toEqual(["500", "1000", "10000"]);
    expect(["foo", "Bar", "bar"].sort(compareDimensionValues)).toEqual(["Bar", "bar", "foo"]);
    expect(compareDimensionValues("bar", "bar")).toBe(0);
  });

  it("puts numeric values before the rest whatever the input order", () => {
    const orders = [
      ["2", "10", "1a"],
      ["10", "1a", "2"],
      ["1a", "2", "10"],
    ];

    for (const values of orders) {
      expect([...values].sort(compareDimensionValues)).toEqual(["2", "10", "1a"]);
    }
    expect(compareDimensionValues("10", "1a")).toBe(-1);
    expect(compareDimensionValues("1a", "2")).toBe(1);
  });

  it("falls back to text when numbers compare equal or overflow", () => {
    expect(compareDimensionValues("1e400", "1e401")).toBe(-1);
    expect(compareDimensionValues("1e401", "1e400")).toBe(1);
    expect(compareDimensionValues("1.0", "1")).toBe(1);
    expect(compareDimensionValues("1", "1.0")).toBe(-1);
  });
});

describe("compareKeys", () => {
  it("compares tuples element by element", () => {
    expect(compareKeys(["SELECT", "bar"], ["SELECT", "foo"])).toBeLessThan(0);
    expect(compareKeys(["INSERT", "zeta"], ["SELECT", "alpha"])).toBeLessThan(0);
    expect(compareKeys(["SELECT"], ["SELECT", "bar"])).toBeLessThan(0);
    expect(compareKeys(["SELECT", "bar"], ["SELECT", "bar"])).toBe(0);
  });
});

describe("compareKeysLexicographically", () => {
  it("compares by code unit even for numeric values", () => {
    expect(compareKeysLexicographically(["1000"], ["500"])).toBe(-1);
    expect(compareKeys(["1000"], ["500"])).toBe(1);
    expect(compareKeysLexicographically(["SELECT", "10"], ["SELECT", "1a"])).toBe(-1);
    expect(compareKeysLexicographically(["SELECT"], ["SELECT"])).toBe(0);
  });
});

describe("filterRecords", () => {
  const { recordSet } = ingest(
    [
      {
        name: "rows",
        rows: [
          { Category: "Operation", Metric: "SELECT", time: 1 },
          { Category: "Operation", Metric: "COMPLEX_SELECT", time: 2 },
          { Category: "Memory", Metric: "Peak_MB", time: 3 },
        ],
      },
    ],
    { dimensions: ["Category", "Metric"], numericFields: ["time"] },
    { logger: silentLogger },
  );

  it("keeps records matching every condition", () => {
    const operations = filterRecords(recordSet, { Category: ["Operation"] });
    expect(operations.records.map((record) => record.dimensions.Metric)).toEqual([
      "SELECT",
      "COMPLEX_SELECT",
    ]);

    const complex = filterRecords(recordSet, { Category: ["Operation"], Metric: { prefix: "COMPLEX_" } });
    expect(complex.records.map((record) => record.values.time)).toEqual([2]);
    expect(complex.dimensionNames).toEqual(recordSet.dimensionNames);
  });

  it("leaves the source record set untouched", () => {
    filterRecords(recordSet, { Category: ["Memory"] });
    expect(recordSet.records).toHaveLength(3);
  });

  it("rejects unknown dimensions", () => {
    expect(() => filterRecords(recordSet, { DataType: ["int"] })).toThrow(SchemaMismatchError);
  });
});
