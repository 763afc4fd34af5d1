import type { RecordSchema } from "@/lib/bench-types";
import type { AnalysisPlan } from "@/lib/analysis";

export interface AnalysisPreset {
  name: string;
  schema: RecordSchema;
  plan: AnalysisPlan;
}

export const BASIC_OPERATIONS = ["SELECT", "INSERT", "UPDATE", "DELETE"];
export const COMPLEX_OPERATIONS = ["COMPLEX_SELECT", "COMPLEX_UPDATE", "COMPLEX_DELETE"];

const OPERATIONS_ONLY = { Category: ["Operation"] };
const TIME = "Average_Time_ms";

/** `summary_statistics.csv`: one row per operation (or memory figure) per implementation/data type. */
export const summaryStatisticsPreset: AnalysisPreset = {
  name: "summary-statistics",
  schema: {
    dimensions: ["Category", "Metric"],
    composites: [{ column: "Best_Implementation", parts: ["Implementation", "DataType"] }],
    numericFields: [TIME, "Sample_Count"],
  },
  plan: {
    aggregations: [
      {
        name: "operation-time",
        dimensions: ["Implementation", "DataType"],
        field: TIME,
        where: OPERATIONS_ONLY,
      },
      {
        // Average_Time_ms holds MB for memory rows
        name: "memory-usage",
        dimensions: ["Implementation", "Metric"],
        field: TIME,
        where: { Category: ["Memory"] },
      },
    ],
    rankings: [
      {
        name: "best-implementation-per-operation",
        dimensions: ["Metric", "Implementation", "DataType"],
        outerDimensions: ["Metric"],
        field: TIME,
        direction: "minimize",
        where: OPERATIONS_ONLY,
      },
    ],
    pivots: [
      {
        name: "operation-performance",
        rowDimension: "Implementation",
        columnDimension: "Metric",
        field: TIME,
        where: OPERATIONS_ONLY,
      },
      {
        name: "data-type-performance",
        rowDimension: "DataType",
        columnDimension: "Metric",
        field: TIME,
        where: OPERATIONS_ONLY,
      },
      {
        name: "basic-operations",
        rowDimension: "Implementation",
        columnDimension: "Metric",
        field: TIME,
        where: { ...OPERATIONS_ONLY, Metric: BASIC_OPERATIONS },
      },
      {
        name: "complex-operations",
        rowDimension: "Implementation",
        columnDimension: "Metric",
        field: TIME,
        where: { ...OPERATIONS_ONLY, Metric: COMPLEX_OPERATIONS },
      },
      {
        name: "memory-by-data-type",
        rowDimension: "DataType",
        columnDimension: "Implementation",
        field: TIME,
        where: { Category: ["Memory"], Metric: ["Average_MB"] },
      },
    ],
    profiles: [
      {
        name: "implementation-characteristics",
        rowDimension: "Implementation",
        categoryDimension: "Metric",
        field: TIME,
        where: OPERATIONS_ONLY,
        categories: [
          { label: "Avg Basic Op Time", match: BASIC_OPERATIONS },
          { label: "Avg Complex Op Time", match: { prefix: "COMPLEX_" } },
          { label: "Write Performance", match: ["INSERT", "UPDATE"] },
          { label: "Read Performance", match: ["SELECT", "COMPLEX_SELECT"] },
          { label: "Operation Consistency", reducer: "std" },
        ],
      },
    ],
  },
};

const SCALABILITY_METRICS = [
  "TotalTime(ms)",
  "AvgTimePerOp(ms)",
  "MinLatency(ms)",
  "MaxLatency(ms)",
  "50thPercentile(ms)",
  "90thPercentile(ms)",
  "MemoryOverhead(MB)",
];

const byRowCount = (name: string, field: string) => ({
  name,
  rowDimension: "Implementation",
  columnDimension: "RowCount",
  field,
});

/** `scalability_test_results.csv`: one row per implementation per tested row count. */
export const scalabilityPreset: AnalysisPreset = {
  name: "scalability",
  schema: {
    dimensions: ["Implementation", "RowCount"],
    numericFields: SCALABILITY_METRICS,
  },
  plan: {
    aggregations: [
      { name: "avg-time-per-op-summary", dimensions: ["RowCount", "Implementation"], field: "AvgTimePerOp(ms)" },
      { name: "memory-overhead-summary", dimensions: ["Implementation"], field: "MemoryOverhead(MB)" },
    ],
    rankings: [
      {
        name: "best-implementation-per-row-count",
        dimensions: ["RowCount", "Implementation"],
        outerDimensions: ["RowCount"],
        field: "AvgTimePerOp(ms)",
        direction: "minimize",
      },
    ],
    pivots: [
      byRowCount("total-time", "TotalTime(ms)"),
      byRowCount("avg-time-per-op", "AvgTimePerOp(ms)"),
      byRowCount("p50-latency", "50thPercentile(ms)"),
      byRowCount("p90-latency", "90thPercentile(ms)"),
      byRowCount("memory-overhead", "MemoryOverhead(MB)"),
    ],
  },
};

/**
 * Access pattern files (frequency, sequential, range). Each source's name
 * becomes its `Pattern` value, so pass them as e.g. `{ name: "Frequency", text }`.
 */
export const accessPatternPreset: AnalysisPreset = {
  name: "access-patterns",
  schema: {
    dimensions: [],
    composites: [{ column: "Implementation_DataType", parts: ["Implementation", "DataType"] }],
    numericFields: [TIME],
    sourceDimension: "Pattern",
  },
  plan: {
    aggregations: [
      { name: "pattern-summary", dimensions: ["Pattern", "Implementation", "DataType"], field: TIME },
    ],
    rankings: [
      {
        name: "best-implementation-per-pattern",
        dimensions: ["Pattern", "Implementation", "DataType"],
        outerDimensions: ["Pattern"],
        field: TIME,
        direction: "minimize",
      },
    ],
    pivots: [
      {
        name: "pattern-latency",
        rowDimension: "Implementation",
        columnDimension: "Pattern",
        field: TIME,
      },
    ],
  },
};
