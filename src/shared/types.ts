/** Medical event categories, in declaration (tie-break) order */
export const EVENT_CATEGORIES = [
  "SYMPTOM",
  "MEDICATION",
  "APPOINTMENT",
  "TEST",
  "EMERGENCY",
  "OBSERVATION",
  "ADVERSE_REACTION",
] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

/** Severity levels, ordered from least to most severe */
export const EVENT_SEVERITIES = ["MILD", "MODERATE", "SEVERE", "CRITICAL"] as const;

export type EventSeverity = (typeof EVENT_SEVERITIES)[number];

/** Intended time-of-day category for an administration */
export const DOSAGE_SCHEDULES = [
  "AM",
  "PM",
  "MIDDAY",
  "BEDTIME",
  "AS_NEEDED",
  "EVERY_4_HOURS",
  "EVERY_6_HOURS",
  "EVERY_8_HOURS",
  "EVERY_12_HOURS",
  "CUSTOM",
] as const;

export type DosageSchedule = (typeof DOSAGE_SCHEDULES)[number];

/** A single recorded medication administration. Never mutated by analytics. */
export interface DosageRecord {
  id: string;
  patientId: string;
  medicationId: string;
  administrationTime: Date;
  amount: number;
  unit: string;
  schedule: DosageSchedule;
  administered: boolean;
  notes?: string;
}

/** A recorded medical event. `title`/`description` are opaque to analytics. */
export interface MedicalEvent {
  id: string;
  patientId: string;
  medicationId?: string;
  eventTime: Date;
  severity: EventSeverity;
  category: EventCategory;
  title: string;
  description?: string;
}

/** Medication as seen by a patient: name plus the date they started it */
export interface MedicationRef {
  id: string;
  name: string;
  startDate?: Date;
}

export type CategoryCounts = Record<EventCategory, number>;
export type SeverityCounts = Record<EventSeverity, number>;

/** Correlation risk band derived from correlation strength */
export type CorrelationRiskLevel = "CRITICAL" | "HIGH" | "MODERATE" | "LOW";

/** Medication-to-event correlation result */
export interface CorrelationResult {
  medicationId: string;
  medicationName: string;
  patientId: string;
  totalDosages: number;
  eventsAfterDosage: number;
  correlationPercentage: number; // 0–100
  correlationStrength: number; // 0–1, confidence-adjusted
  eventsByCategory: CategoryCounts;
  eventsBySeverity: SeverityCounts;
  generatedAt: string;
}

export type TimelinePointKind = "DOSAGE" | "EVENT";

/** One point on a merged dosage/event timeline */
export interface TimelinePoint {
  timestamp: string;
  kind: TimelinePointKind;
  description: string;
  value: number | null;
  unit: string | null;
  severity: EventSeverity | null;
}

export interface TimelineAnalysis {
  patientId: string;
  periodStart: string;
  periodEnd: string;
  dataPoints: TimelinePoint[];
  generatedAt: string;
}

export interface TimelineStatistics {
  totalDataPoints: number;
  eventCount: number;
  dosageCount: number;
  timeSpanDays: number;
}

/** Patient-level roll-up. Ratios are derived, never stored. */
export interface DashboardSummary {
  patientId: string;
  totalEvents: number;
  totalDosages: number;
  eventsByCategory: CategoryCounts;
  eventsBySeverity: SeverityCounts;
  recentEventsLast7Days: number;
  generatedAt: string;
}

export type EffectivenessCategory =
  | "EXCELLENT"
  | "GOOD"
  | "MODERATE"
  | "POOR"
  | "INEFFECTIVE";

export type MedicationPhase = "before_medication" | "after_medication";

/** 7-day bucket of credited events, labelled relative to the medication start */
export interface WeeklyTrendBucket {
  week: number; // 1-based
  start: string;
  end: string;
  phase: MedicationPhase;
  eventCount: number;
}

/** Before/after impact of a medication over an analysis window */
export interface ImpactAnalysis {
  medicationId: string;
  medicationName: string;
  patientId: string;
  analysisPeriodStart: string;
  analysisPeriodEnd: string;
  totalDosages: number;
  eventsWithin24Hours: number;
  eventRatePercentage: number;
  symptomEvents: number;
  adverseReactionEvents: number;
  symptomReductionPercentage: number; // -100–100
  effectivenessScore: number; // 0–1
  weeklyTrends: WeeklyTrendBucket[];
  generatedAt: string;
}
