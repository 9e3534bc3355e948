import type {
  DosageRecord,
  EventCategory,
  EventSeverity,
  MedicalEvent,
} from "../src/shared/types.js";
import { HOUR_MS } from "../src/analytics/time.js";

export const PATIENT = "patient-1";
export const T0 = new Date("2024-03-01T08:00:00.000Z");

/** T0 shifted by a number of hours. */
export function at(hours: number, base: Date = T0): Date {
  return new Date(base.getTime() + hours * HOUR_MS);
}

export function dosage(
  id: string,
  time: Date,
  overrides: Partial<DosageRecord> = {}
): DosageRecord {
  return {
    id,
    patientId: PATIENT,
    medicationId: "med-a",
    administrationTime: time,
    amount: 500,
    unit: "mg",
    schedule: "AM",
    administered: true,
    ...overrides,
  };
}

export function event(
  id: string,
  time: Date,
  category: EventCategory = "SYMPTOM",
  severity: EventSeverity = "MILD",
  overrides: Partial<MedicalEvent> = {}
): MedicalEvent {
  return {
    id,
    patientId: PATIENT,
    eventTime: time,
    severity,
    category,
    title: `Event ${id}`,
    ...overrides,
  };
}
