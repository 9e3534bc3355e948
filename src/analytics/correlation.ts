import type {
  CorrelationResult,
  CorrelationRiskLevel,
  DosageRecord,
  EventCategory,
  EventSeverity,
  MedicalEvent,
  MedicationRef,
} from "../shared/types.js";
import { creditEvents } from "./crediting.js";
import { clamp, percentage, ratio } from "./stats.js";
import {
  countByCategory,
  countBySeverity,
  mostCommonCategory,
  mostCommonSeverity,
} from "./tally.js";
import { selectDosages } from "./time_window.js";

/** Dosage count at which sample-size confidence saturates. */
const FULL_CONFIDENCE_DOSAGES = 10;

export const UNKNOWN_MEDICATION_NAME = "Unknown Medication";

export interface CorrelationInput {
  patientId: string;
  medication: MedicationRef;
  dosages: readonly DosageRecord[];
  events: readonly MedicalEvent[];
  start?: Date;
  end?: Date;
  now?: Date;
}

/**
 * Confidence-adjusted correlation strength in [0, 1].
 * Non-decreasing in both the percentage and the sample size, and below 1.0
 * for fewer than 10 dosages.
 */
export function correlationStrength(correlationPercentage: number, totalDosages: number): number {
  const signal = Math.min(Math.max(correlationPercentage, 0) / 100, 1);
  const confidence = Math.min(Math.max(totalDosages, 0) / FULL_CONFIDENCE_DOSAGES, 1);
  return signal * confidence;
}

export function riskLevel(strength: number): CorrelationRiskLevel {
  if (strength >= 0.8) return "CRITICAL";
  if (strength >= 0.6) return "HIGH";
  if (strength >= 0.4) return "MODERATE";
  return "LOW";
}

/**
 * Correlate one medication's administered dosages with the patient's events.
 *
 * Each event is credited to at most one dosage (see creditEvents); the
 * category and severity maps tally credited events only.
 */
export function computeCorrelation(input: CorrelationInput): CorrelationResult {
  const { patientId, medication, events } = input;

  const dosages = selectDosages(input.dosages, input.start, input.end).filter(
    (d) => d.administered && d.medicationId === medication.id
  );
  const credited = creditEvents(dosages, events).map((c) => c.event);

  const totalDosages = dosages.length;
  const eventsAfterDosage = credited.length;
  const correlationPercentage = clamp(percentage(eventsAfterDosage, totalDosages), 0, 100);

  return {
    medicationId: medication.id,
    medicationName: medication.name,
    patientId,
    totalDosages,
    eventsAfterDosage,
    correlationPercentage,
    correlationStrength: correlationStrength(correlationPercentage, totalDosages),
    eventsByCategory: countByCategory(credited),
    eventsBySeverity: countBySeverity(credited),
    generatedAt: (input.now ?? new Date()).toISOString(),
  };
}

/**
 * Run computeCorrelation for every distinct medication found in `dosages`,
 * in first-seen order. Medications missing from `medications` get a
 * placeholder name.
 */
export function computeAllCorrelations(
  patientId: string,
  medications: readonly MedicationRef[],
  dosages: readonly DosageRecord[],
  events: readonly MedicalEvent[],
  now: Date = new Date()
): CorrelationResult[] {
  const byId = new Map(medications.map((m) => [m.id, m]));
  const ids = [...new Set(dosages.map((d) => d.medicationId))];

  return ids.map((id) =>
    computeCorrelation({
      patientId,
      medication: byId.get(id) ?? { id, name: UNKNOWN_MEDICATION_NAME },
      dosages: dosages.filter((d) => d.medicationId === id),
      events,
      now,
    })
  );
}

// ── Derived accessors ────────────────────────────────────────────────

export function correlationRiskLevel(result: CorrelationResult): CorrelationRiskLevel {
  return riskLevel(result.correlationStrength);
}

export function hasStrongCorrelation(result: CorrelationResult): boolean {
  return result.correlationStrength >= 0.7;
}

/** Adverse reactions make up more than 20% of credited events. */
export function hasConcerningAdverseReactions(result: CorrelationResult): boolean {
  return ratio(result.eventsByCategory.ADVERSE_REACTION, result.eventsAfterDosage) > 0.2;
}

export function correlationMostCommonCategory(result: CorrelationResult): EventCategory | null {
  return mostCommonCategory(result.eventsByCategory);
}

export function correlationMostCommonSeverity(result: CorrelationResult): EventSeverity | null {
  return mostCommonSeverity(result.eventsBySeverity);
}
