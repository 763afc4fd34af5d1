export type DimensionValues = Readonly<Record<string, string>>;

/** `null` marks a cell that could not be coerced to a finite number. */
export type Measurement = number | null;

export interface BenchRecord {
  readonly dimensions: DimensionValues;
  readonly values: Readonly<Record<string, Measurement>>;
}

export interface CompositeColumn {
  column: string;
  parts: string[];
  delimiter?: string;
}

export interface RecordSchema {
  dimensions: string[];
  composites?: CompositeColumn[];
  numericFields: string[];
  sourceDimension?: string;
}

export interface RecordSet {
  readonly dimensionNames: readonly string[];
  readonly numericFields: readonly string[];
  readonly records: readonly BenchRecord[];
}

export type GroupingKey = readonly string[];

export interface Aggregate {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  /** Sample standard deviation; undefined for a single observation. */
  readonly std: number | undefined;
  readonly count: number;
}

export interface GroupAggregate {
  readonly key: GroupingKey;
  readonly aggregate: Aggregate;
}

export interface GroupedAggregates {
  readonly dimensions: readonly string[];
  readonly field: string;
  readonly groups: readonly GroupAggregate[];
}

export type RankDirection = "minimize" | "maximize";

export interface RankedEntry {
  outerKey: GroupingKey;
  key: GroupingKey;
  value: number;
  aggregate: Aggregate;
  candidates: number;
}

export type RankOutcome =
  | { status: "ranked"; outerKey: GroupingKey; entry: RankedEntry }
  | { status: "no-candidates"; outerKey: GroupingKey };

export interface Ranking {
  readonly dimensions: readonly string[];
  readonly outerDimensions: readonly string[];
  readonly field: string;
  readonly direction: RankDirection;
  readonly outcomes: readonly RankOutcome[];
}

export type NamedReducer = "mean" | "min" | "max" | "std" | "count";
export type Reducer = NamedReducer | ((values: readonly number[]) => number);

export type PivotCell =
  | { status: "observed"; value: number | undefined; aggregate: Aggregate }
  | { status: "missing" };

export interface ComparisonTable {
  readonly rowDimension: string;
  readonly columnDimension: string;
  readonly field: string;
  readonly reducer: string;
  readonly rowKeys: readonly string[];
  readonly columnKeys: readonly string[];
  readonly cells: readonly (readonly PivotCell[])[];
}
