import { and, asc, eq, gte, lte, type SQL } from "drizzle-orm";
import type { Database } from "../db/connection.js";
import * as schema from "../db/schema.js";
import type { DosageRecord, MedicalEvent, MedicationRef } from "../shared/types.js";
import { assertValidRange } from "../analytics/time_window.js";
import { DosageRecordSchema, MedicalEventSchema } from "./schemas.js";
import type { RecordQuery, RecordSource } from "./source.js";

/**
 * RecordSource backed by PostgreSQL. Rows are passed through the record
 * schemas so enum columns stored as varchar are checked on the way out.
 */
export class DrizzleRecordSource implements RecordSource {
  constructor(private readonly db: Database) {}

  async fetchDosages(patientId: string, query: RecordQuery = {}): Promise<DosageRecord[]> {
    const t = schema.medicationDosages;
    const conditions: (SQL | undefined)[] = [eq(t.patientId, patientId)];
    if (query.medicationId !== undefined) conditions.push(eq(t.medicationId, query.medicationId));
    conditions.push(...rangeConditions(t.administrationTime, query));

    const rows = await this.db
      .select()
      .from(t)
      .where(and(...conditions))
      .orderBy(asc(t.administrationTime));

    return rows.map((row) =>
      DosageRecordSchema.parse({
        id: row.id,
        patientId: row.patientId,
        medicationId: row.medicationId,
        administrationTime: row.administrationTime,
        amount: row.dosageAmount,
        unit: row.dosageUnit,
        schedule: row.schedule,
        administered: row.administered,
        notes: row.notes,
      })
    );
  }

  async fetchEvents(patientId: string, query: RecordQuery = {}): Promise<MedicalEvent[]> {
    const t = schema.medicalEvents;
    const conditions: (SQL | undefined)[] = [eq(t.patientId, patientId)];
    if (query.medicationId !== undefined) conditions.push(eq(t.medicationId, query.medicationId));
    conditions.push(...rangeConditions(t.eventTime, query));

    const rows = await this.db
      .select()
      .from(t)
      .where(and(...conditions))
      .orderBy(asc(t.eventTime));

    return rows.map((row) =>
      MedicalEventSchema.parse({
        id: row.id,
        patientId: row.patientId,
        medicationId: row.medicationId,
        eventTime: row.eventTime,
        severity: row.severity,
        category: row.category,
        title: row.title,
        description: row.description,
      })
    );
  }

  async findMedication(patientId: string, medicationId: string): Promise<MedicationRef | null> {
    const rows = await this.db
      .select({
        id: schema.medications.id,
        name: schema.medications.name,
        startDate: schema.patientMedications.startDate,
      })
      .from(schema.patientMedications)
      .innerJoin(schema.medications, eq(schema.patientMedications.medicationId, schema.medications.id))
      .where(
        and(
          eq(schema.patientMedications.patientId, patientId),
          eq(schema.patientMedications.medicationId, medicationId)
        )
      )
      .orderBy(asc(schema.patientMedications.startDate))
      .limit(1);

    if (rows.length > 0) {
      const row = rows[0];
      return { id: row.id, name: row.name, startDate: row.startDate ?? undefined };
    }

    // Dosages can reference a medication the patient was never formally assigned.
    const meds = await this.db
      .select({ id: schema.medications.id, name: schema.medications.name })
      .from(schema.medications)
      .where(eq(schema.medications.id, medicationId))
      .limit(1);
    return meds.length > 0 ? { id: meds[0].id, name: meds[0].name } : null;
  }

  async listMedicationIds(patientId: string): Promise<string[]> {
    const t = schema.medicationDosages;
    const rows = await this.db
      .select({ medicationId: t.medicationId })
      .from(t)
      .where(eq(t.patientId, patientId))
      .orderBy(asc(t.administrationTime));
    return [...new Set(rows.map((r) => r.medicationId))];
  }
}

function rangeConditions(
  column: typeof schema.medicationDosages.administrationTime | typeof schema.medicalEvents.eventTime,
  query: RecordQuery
): SQL[] {
  assertValidRange(query.start, query.end);
  const conditions: SQL[] = [];
  if (query.start) conditions.push(gte(column, query.start));
  if (query.end) conditions.push(lte(column, query.end));
  return conditions;
}
