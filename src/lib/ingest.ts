import Papa from "papaparse";
import type {
  BenchRecord,
  Measurement,
  RecordSchema,
  RecordSet,
} from "@/lib/bench-types";
import { SchemaMismatchError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import type { Logger } from "@/lib/logger";

export const DEFAULT_COMPOSITE_DELIMITER = "__";

type RawRow = Record<string, unknown>;

export type TabularSource =
  | { name: string; text: string }
  | { name: string; rows: readonly RawRow[] };

export interface IngestOptions {
  onSchemaMismatch?: "throw" | "skip";
  logger?: Logger;
}

export interface IngestStats {
  rowsRead: number;
  recordsKept: number;
  droppedRows: number;
  invalidCells: number;
  invalidByField: Record<string, number>;
}

export interface IngestResult {
  status: "ok" | "empty";
  recordSet: RecordSet;
  stats: IngestStats;
  emptySources: string[];
  skippedSources: SchemaMismatchError[];
}

interface ParsedSource {
  name: string;
  fields: string[];
  rows: readonly RawRow[];
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const coerceMeasurement = (raw: unknown): Measurement => {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

const coerceDimension = (raw: unknown): string | null => {
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return trimmed === "" ? null : trimmed;
};

export function parseCsv(name: string, text: string): ParsedSource {
  if (!text.trim()) return { name, fields: [], rows: [] };

  const parsed = Papa.parse<RawRow>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  return { name, fields: parsed.meta.fields ?? [], rows: parsed.data };
}

const toParsedSource = (source: TabularSource): ParsedSource => {
  if ("text" in source) return parseCsv(source.name, source.text);
  const fields = new Set<string>();
  for (const row of source.rows) {
    for (const field of Object.keys(row)) fields.add(field);
  }
  return { name: source.name, fields: [...fields], rows: source.rows };
};

export function schemaDimensionNames(schema: RecordSchema): string[] {
  const names = [...schema.dimensions];
  for (const composite of schema.composites ?? []) names.push(...composite.parts);
  if (schema.sourceDimension) names.push(schema.sourceDimension);
  return names;
}

function requiredColumns(schema: RecordSchema): string[] {
  return [
    ...schema.dimensions,
    ...(schema.composites ?? []).map((composite) => composite.column),
    ...schema.numericFields,
  ];
}

export function checkSchema(source: ParsedSource, schema: RecordSchema): void {
  const missing = requiredColumns(schema).filter((column) => !source.fields.includes(column));
  if (missing.length) throw new SchemaMismatchError(source.name, missing);
}

/** Returns null when the row cannot yield a record. */
function toRecord(row: RawRow, schema: RecordSchema, sourceName: string): BenchRecord | null {
  const dimensions: Record<string, string> = {};

  for (const column of schema.dimensions) {
    const value = coerceDimension(row[column]);
    if (value === null) return null;
    dimensions[column] = value;
  }

  for (const composite of schema.composites ?? []) {
    const value = coerceDimension(row[composite.column]);
    if (value === null) return null;
    const parts = value.split(composite.delimiter ?? DEFAULT_COMPOSITE_DELIMITER);
    if (parts.length !== composite.parts.length || parts.some((part) => part === "")) {
      return null;
    }
    composite.parts.forEach((part, index) => {
      dimensions[part] = parts[index];
    });
  }

  if (schema.sourceDimension) dimensions[schema.sourceDimension] = sourceName;

  const values: Record<string, Measurement> = {};
  for (const field of schema.numericFields) {
    values[field] = coerceMeasurement(row[field]);
  }

  return Object.freeze({
    dimensions: Object.freeze(dimensions),
    values: Object.freeze(values),
  });
}

/**
 * Reads every source into one record set. Row-level problems are counted,
 * a source whose header lacks a declared column raises SchemaMismatchError
 * (or is skipped, with `onSchemaMismatch: "skip"`).
 */
export function ingest(
  sources: readonly TabularSource[] | undefined,
  schema: RecordSchema,
  options: IngestOptions = {},
): IngestResult {
  const logger = options.logger ?? createLogger();
  const records: BenchRecord[] = [];
  const emptySources: string[] = [];
  const skippedSources: SchemaMismatchError[] = [];
  const invalidByField: Record<string, number> = {};
  for (const field of schema.numericFields) invalidByField[field] = 0;
  let rowsRead = 0;
  let droppedRows = 0;

  for (const source of sources ?? []) {
    const parsed = toParsedSource(source);

    if (parsed.fields.length === 0 && parsed.rows.length === 0) {
      emptySources.push(parsed.name);
      continue;
    }

    try {
      checkSchema(parsed, schema);
    } catch (error) {
      if (options.onSchemaMismatch === "skip" && error instanceof SchemaMismatchError) {
        logger.warn(`Skipping ${parsed.name}: ${error.message}`);
        skippedSources.push(error);
        continue;
      }
      throw error;
    }

    if (parsed.rows.length === 0) {
      emptySources.push(parsed.name);
      continue;
    }

    let dropped = 0;
    let invalid = 0;
    for (const row of parsed.rows) {
      rowsRead++;
      const record = toRecord(row, schema, parsed.name);
      if (!record) {
        dropped++;
        continue;
      }
      for (const field of schema.numericFields) {
        if (record.values[field] === null) {
          invalid++;
          invalidByField[field]++;
        }
      }
      records.push(record);
    }

    droppedRows += dropped;
    if (dropped) logger.warn(`Dropped ${dropped} malformed row(s) from ${parsed.name}`);
    if (invalid) logger.warn(`${invalid} non-numeric cell(s) marked invalid in ${parsed.name}`);
  }

  const invalidCells = Object.values(invalidByField).reduce((sum, count) => sum + count, 0);
  logger.info(`Ingested ${records.length} record(s) from ${sources?.length ?? 0} source(s)`);

  return {
    status: records.length ? "ok" : "empty",
    recordSet: Object.freeze({
      dimensionNames: Object.freeze(schemaDimensionNames(schema)),
      numericFields: Object.freeze([...schema.numericFields]),
      records: Object.freeze(records),
    }),
    stats: {
      rowsRead,
      recordsKept: records.length,
      droppedRows,
      invalidCells,
      invalidByField,
    },
    emptySources,
    skippedSources,
  };
}
