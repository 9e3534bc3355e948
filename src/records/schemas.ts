import { z } from "zod";
import { DOSAGE_SCHEDULES, EVENT_CATEGORIES, EVENT_SEVERITIES } from "../shared/types.js";
import type { MedicalEvent } from "../shared/types.js";

const booleanish = z.preprocess(
  (v) => (typeof v === "string" ? v.toLowerCase() === "true" || v === "1" : v),
  z.boolean()
);

const optionalText = z.preprocess(
  (v) => (v === "" || v === null ? undefined : v),
  z.string().optional()
);

const instant = z.coerce.date().refine((d) => !Number.isNaN(d.getTime()), {
  message: "Invalid date",
});

// ── Dosage Record ──────────────────────────────────────────────────
export const DosageRecordSchema = z.object({
  id: z.string().min(1),
  patientId: z.string().min(1),
  medicationId: z.string().min(1),
  administrationTime: instant,
  amount: z.preprocess(
    (v) => (typeof v === "string" ? Number(v) : v),
    z.number().finite().nonnegative()
  ),
  unit: z.string().min(1),
  schedule: z.enum(DOSAGE_SCHEDULES),
  administered: booleanish,
  notes: optionalText,
});

// ── Medical Event ──────────────────────────────────────────────────
export const MedicalEventSchema = z.object({
  id: z.string().min(1),
  patientId: z.string().min(1),
  medicationId: optionalText,
  eventTime: instant,
  severity: z.enum(EVENT_SEVERITIES),
  category: z.enum(EVENT_CATEGORIES),
  title: z.string().min(1),
  description: optionalText,
});

export interface RecordIssue {
  index: number;
  issues: string[];
}

/**
 * Validate an array of records against a schema.
 * Returns validated records, the input row of each, and errors.
 */
export function validateRecords<T>(
  records: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { valid: T[]; rows: number[]; errors: RecordIssue[] } {
  const valid: T[] = [];
  const rows: number[] = [];
  const errors: RecordIssue[] = [];

  for (let i = 0; i < records.length; i++) {
    const result = schema.safeParse(records[i]);
    if (result.success) {
      valid.push(result.data);
      rows.push(i);
    } else {
      errors.push({
        index: i,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
    }
  }

  return { valid, rows, errors };
}

/**
 * Events dated after `now` are rejected; an event is never in the future.
 * `rows` maps each event to its input row, as returned by validateRecords.
 */
export function futureEventIssues(
  events: MedicalEvent[],
  now: Date,
  rows: readonly number[] = events.map((_, i) => i)
): RecordIssue[] {
  const issues: RecordIssue[] = [];
  events.forEach((e, i) => {
    if (e.eventTime.getTime() > now.getTime()) {
      issues.push({
        index: rows[i] ?? i,
        issues: [`eventTime: ${e.eventTime.toISOString()} is in the future`],
      });
    }
  });
  return issues;
}
