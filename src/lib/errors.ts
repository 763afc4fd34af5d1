export type AnalysisErrorCode = "SCHEMA_MISMATCH" | "INVALID_PLAN";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
  }
}

/**
 * A declared column (or a dimension/field asked of a record set) does not
 * exist. Fatal for the source it was raised for.
 */
export class SchemaMismatchError extends AnalysisError {
  readonly source: string;
  readonly missing: string[];

  constructor(source: string, missing: string[]) {
    super("SCHEMA_MISMATCH", `${source}: missing column(s) ${missing.join(", ")}`);
    this.name = "SchemaMismatchError";
    this.source = source;
    this.missing = missing;
  }
}

export class InvalidPlanError extends AnalysisError {
  readonly step: string;

  constructor(step: string, message: string) {
    super("INVALID_PLAN", `${step}: ${message}`);
    this.name = "InvalidPlanError";
    this.step = step;
  }
}
