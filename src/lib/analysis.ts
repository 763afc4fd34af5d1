import type {
  ComparisonTable,
  GroupedAggregates,
  GroupingKey,
  RankDirection,
  Ranking,
  RecordSet,
  Reducer,
} from "@/lib/bench-types";
import { aggregate } from "@/lib/aggregate";
import { profileCharacteristics } from "@/lib/characteristics";
import type { CharacteristicsSpec } from "@/lib/characteristics";
import { InvalidPlanError } from "@/lib/errors";
import { encodeKey, filterRecords, keyOf } from "@/lib/grouping";
import type { RecordFilter } from "@/lib/grouping";
import { createLogger } from "@/lib/logger";
import type { Logger } from "@/lib/logger";
import { pivot } from "@/lib/pivot";
import { selectBest } from "@/lib/rank";

interface Step {
  name: string;
  where?: RecordFilter;
}

export interface AggregationStep extends Step {
  dimensions: string[];
  field: string;
}

export interface RankingStep extends Step {
  /** Full grouping key; must contain every outer dimension. */
  dimensions: string[];
  outerDimensions: string[];
  field: string;
  direction: RankDirection;
}

export interface PivotStep extends Step {
  rowDimension: string;
  columnDimension: string;
  field: string;
  reducer?: Reducer;
}

export interface ProfileStep extends Step, CharacteristicsSpec {}

export interface AnalysisPlan {
  aggregations?: AggregationStep[];
  rankings?: RankingStep[];
  pivots?: PivotStep[];
  profiles?: ProfileStep[];
}

export type AnalysisOutput =
  | { status: "empty" }
  | {
      status: "ok";
      aggregates: Record<string, GroupedAggregates>;
      rankings: Record<string, Ranking>;
      tables: Record<string, ComparisonTable>;
    };

function assertUniqueNames(plan: AnalysisPlan): void {
  const seen = new Set<string>();
  const steps: Step[] = [
    ...(plan.aggregations ?? []),
    ...(plan.rankings ?? []),
    ...(plan.pivots ?? []),
    ...(plan.profiles ?? []),
  ];
  for (const { name } of steps) {
    if (seen.has(name)) throw new InvalidPlanError(name, "duplicate step name");
    seen.add(name);
  }
}

const scope = (recordSet: RecordSet, step: Step) =>
  step.where ? filterRecords(recordSet, step.where) : recordSet;

/** Every outer key present in the records, whether or not its values are valid. */
function observedOuterKeys(recordSet: RecordSet, outerDimensions: readonly string[]): GroupingKey[] {
  const keys = new Map<string, GroupingKey>();
  for (const record of recordSet.records) {
    const key = keyOf(record, outerDimensions);
    keys.set(encodeKey(key), key);
  }
  return [...keys.values()];
}

export function runAnalysis(
  recordSet: RecordSet,
  plan: AnalysisPlan,
  options: { logger?: Logger } = {},
): AnalysisOutput {
  const logger = options.logger ?? createLogger();
  assertUniqueNames(plan);

  if (recordSet.records.length === 0) {
    logger.warn("No records to analyse");
    return { status: "empty" };
  }

  const aggregates: Record<string, GroupedAggregates> = {};
  const rankings: Record<string, Ranking> = {};
  const tables: Record<string, ComparisonTable> = {};

  for (const step of plan.aggregations ?? []) {
    aggregates[step.name] = aggregate(scope(recordSet, step), step.dimensions, step.field);
  }

  for (const step of plan.rankings ?? []) {
    const missing = step.outerDimensions.filter((dimension) => !step.dimensions.includes(dimension));
    if (missing.length) {
      throw new InvalidPlanError(step.name, `outer dimension(s) ${missing.join(", ")} not grouped`);
    }
    const scoped = scope(recordSet, step);
    const ranking = selectBest(
      aggregate(scoped, step.dimensions, step.field),
      step.outerDimensions,
      step.direction,
      { outerKeys: observedOuterKeys(scoped, step.outerDimensions) },
    );
    for (const outcome of ranking.outcomes) {
      if (outcome.status === "no-candidates") {
        logger.warn(`${step.name}: no candidates for ${outcome.outerKey.join(" / ")}`);
      }
    }
    rankings[step.name] = ranking;
  }

  for (const step of plan.pivots ?? []) {
    tables[step.name] = pivot(
      scope(recordSet, step),
      step.rowDimension,
      step.columnDimension,
      step.field,
      step.reducer,
    );
  }

  for (const step of plan.profiles ?? []) {
    tables[step.name] = profileCharacteristics(scope(recordSet, step), step);
  }

  logger.info(
    `Analysis produced ${Object.keys(aggregates).length} aggregate(s), ` +
      `${Object.keys(rankings).length} ranking(s), ${Object.keys(tables).length} table(s)`,
  );

  return { status: "ok", aggregates, rankings, tables };
}
