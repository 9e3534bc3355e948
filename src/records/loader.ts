import { readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import type { z } from "zod";
import type { DosageRecord, MedicalEvent } from "../shared/types.js";
import { RecordValidationError, errorMessage } from "../shared/errors.js";
import {
  DosageRecordSchema,
  MedicalEventSchema,
  validateRecords,
  type RecordIssue,
} from "./schemas.js";

export type RecordFormat = "json" | "csv";

export interface LoadedRecords<T> {
  records: T[];
  /** Input row of each record, for reporting. */
  rows: number[];
  errors: RecordIssue[];
}

export function formatFor(fileName: string): RecordFormat {
  return path.extname(fileName).toLowerCase() === ".csv" ? "csv" : "json";
}

/**
 * Raw rows from JSON (an array, or a single object) or CSV with a header row.
 * Throws RecordValidationError when the content cannot be parsed at all.
 */
export function parseRows(content: string, format: RecordFormat): unknown[] {
  try {
    if (format === "csv") {
      const rows: unknown[] = parse(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      });
      return rows;
    }
    const parsed: unknown = JSON.parse(content);
    return Array.isArray(parsed) ? parsed : [parsed];
  } catch (err) {
    throw new RecordValidationError(`Could not parse ${format.toUpperCase()}: ${errorMessage(err)}`);
  }
}

function loadFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): LoadedRecords<T> {
  const content = readFileSync(filePath, "utf-8");
  const { valid, rows, errors } = validateRecords(parseRows(content, formatFor(filePath)), schema);
  return { records: valid, rows, errors };
}

export function loadDosages(filePath: string): LoadedRecords<DosageRecord> {
  return loadFile(filePath, DosageRecordSchema);
}

export function loadEvents(filePath: string): LoadedRecords<MedicalEvent> {
  return loadFile(filePath, MedicalEventSchema);
}
