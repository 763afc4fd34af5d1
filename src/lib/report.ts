import Papa from "papaparse";
import type {
  ComparisonTable,
  GroupedAggregates,
  PivotCell,
  Ranking,
} from "@/lib/bench-types";
import { loadSettings } from "@/lib/config";
import { winnerLabel } from "@/lib/rank";

export interface FormatOptions {
  precision?: number;
  unit?: string;
}

const resolvePrecision = (options: FormatOptions) =>
  options.precision ?? loadSettings().precision;

const formatNumber = (value: number | undefined, precision: number) =>
  value === undefined ? "" : value.toFixed(precision);

const toCsv = (fields: string[], data: string[][]) =>
  Papa.unparse([fields, ...data], { newline: "\n" });

/** One line per outer key, e.g. `SELECT: bar / int (3.000 ms)`. */
export function formatRanking(ranking: Ranking, options: FormatOptions = {}): string[] {
  const precision = resolvePrecision(options);
  const unit = options.unit ? ` ${options.unit}` : "";

  return ranking.outcomes.map((outcome) => {
    const label = outcome.outerKey.length ? outcome.outerKey.join(" / ") : "all";
    if (outcome.status === "no-candidates") return `${label}: no candidates`;
    const winner = winnerLabel(ranking, outcome) ?? "";
    return `${label}: ${winner} (${outcome.entry.value.toFixed(precision)}${unit})`;
  });
}

export function formatSection(title: string, lines: readonly string[]): string {
  return [title, "-".repeat(40), ...lines].join("\n");
}

export function aggregatesToCsv(grouped: GroupedAggregates, options: FormatOptions = {}): string {
  const precision = resolvePrecision(options);
  const fields = [...grouped.dimensions, "mean", "min", "max", "std", "count"];
  const data = grouped.groups.map(({ key, aggregate }) => [
    ...key,
    formatNumber(aggregate.mean, precision),
    formatNumber(aggregate.min, precision),
    formatNumber(aggregate.max, precision),
    formatNumber(aggregate.std, precision),
    String(aggregate.count),
  ]);
  return toCsv(fields, data);
}

const formatCell = (cell: PivotCell, precision: number) =>
  cell.status === "missing" ? "" : formatNumber(cell.value, precision);

/** Missing cells become empty fields so they never read back as 0. */
export function tableToCsv(table: ComparisonTable, options: FormatOptions = {}): string {
  const precision = resolvePrecision(options);
  const fields = [table.rowDimension, ...table.columnKeys];
  const data = table.rowKeys.map((row, index) => [
    row,
    ...table.cells[index].map((cell) => formatCell(cell, precision)),
  ]);
  return toCsv(fields, data);
}
