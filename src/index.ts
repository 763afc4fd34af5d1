export type * from "@/lib/bench-types";
export { aggregate, lookupAggregate, summarize } from "@/lib/aggregate";
export { runAnalysis } from "@/lib/analysis";
export type {
  AggregationStep,
  AnalysisOutput,
  AnalysisPlan,
  PivotStep,
  ProfileStep,
  RankingStep,
} from "@/lib/analysis";
export { CHARACTERISTIC_COLUMN, profileCharacteristics } from "@/lib/characteristics";
export type { CharacteristicCategory, CharacteristicsSpec } from "@/lib/characteristics";
export { DEFAULT_SETTINGS, loadSettings } from "@/lib/config";
export type { AnalysisSettings, LogLevel } from "@/lib/config";
export { AnalysisError, InvalidPlanError, SchemaMismatchError } from "@/lib/errors";
export {
  compareCodeUnits,
  compareDimensionValues,
  compareKeys,
  compareKeysLexicographically,
  filterRecords,
} from "@/lib/grouping";
export type { DimensionMatcher, RecordFilter } from "@/lib/grouping";
export { coerceMeasurement, DEFAULT_COMPOSITE_DELIMITER, ingest } from "@/lib/ingest";
export type { IngestOptions, IngestResult, IngestStats, TabularSource } from "@/lib/ingest";
export { createLogger, silentLogger } from "@/lib/logger";
export type { Logger } from "@/lib/logger";
export { cellAt, pivot, tableToMatrix } from "@/lib/pivot";
export {
  accessPatternPreset,
  BASIC_OPERATIONS,
  COMPLEX_OPERATIONS,
  scalabilityPreset,
  summaryStatisticsPreset,
} from "@/lib/presets";
export type { AnalysisPreset } from "@/lib/presets";
export { findRanked, selectBest, winnerLabel } from "@/lib/rank";
export type { SelectBestOptions } from "@/lib/rank";
export { aggregatesToCsv, formatRanking, formatSection, tableToCsv } from "@/lib/report";
export type { FormatOptions } from "@/lib/report";
