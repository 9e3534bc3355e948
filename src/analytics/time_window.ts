import { InvalidRangeError } from "../shared/errors.js";
import type {
  DosageRecord,
  EventCategory,
  EventSeverity,
  MedicalEvent,
} from "../shared/types.js";

export type Predicate<T> = (record: T) => boolean;

/**
 * Throw InvalidRangeError when both bounds are present and start > end.
 */
export function assertValidRange(start?: Date, end?: Date): void {
  if (start && end && start.getTime() > end.getTime()) {
    throw new InvalidRangeError(start, end);
  }
}

/**
 * Keep records whose timestamp t satisfies start <= t <= end.
 * A missing bound is unbounded on that side. Input order is preserved.
 */
export function selectInWindow<T>(
  records: readonly T[],
  timeOf: (record: T) => Date,
  start?: Date,
  end?: Date
): T[] {
  assertValidRange(start, end);
  const from = start?.getTime() ?? -Infinity;
  const to = end?.getTime() ?? Infinity;
  return records.filter((r) => {
    const t = timeOf(r).getTime();
    return t >= from && t <= to;
  });
}

export function selectDosages(
  dosages: readonly DosageRecord[],
  start?: Date,
  end?: Date
): DosageRecord[] {
  return selectInWindow(dosages, (d) => d.administrationTime, start, end);
}

export function selectEvents(
  events: readonly MedicalEvent[],
  start?: Date,
  end?: Date
): MedicalEvent[] {
  return selectInWindow(events, (e) => e.eventTime, start, end);
}

// ── Composable predicates ────────────────────────────────────────────

export function allOf<T>(...predicates: Predicate<T>[]): Predicate<T> {
  return (record) => predicates.every((p) => p(record));
}

export function byCategories(categories?: readonly EventCategory[]): Predicate<MedicalEvent> {
  if (!categories || categories.length === 0) return () => true;
  const wanted = new Set(categories);
  return (e) => wanted.has(e.category);
}

export function bySeverities(severities?: readonly EventSeverity[]): Predicate<MedicalEvent> {
  if (!severities || severities.length === 0) return () => true;
  const wanted = new Set(severities);
  return (e) => wanted.has(e.severity);
}

export function byMedicationIds<T extends { medicationId?: string }>(
  medicationIds?: readonly string[]
): Predicate<T> {
  if (!medicationIds || medicationIds.length === 0) return () => true;
  const wanted = new Set(medicationIds);
  return (r) => r.medicationId !== undefined && wanted.has(r.medicationId);
}

export function byPatient<T extends { patientId: string }>(patientId?: string): Predicate<T> {
  if (!patientId) return () => true;
  return (r) => r.patientId === patientId;
}

/** Case-insensitive substring match on title or description. */
export function containsText(text?: string): Predicate<MedicalEvent> {
  const needle = text?.trim().toLowerCase() ?? "";
  if (needle === "") return () => true;
  return (e) =>
    e.title.toLowerCase().includes(needle) ||
    (e.description ?? "").toLowerCase().includes(needle);
}

export const administeredOnly: Predicate<DosageRecord> = (d) => d.administered;

export interface MedicalEventSearchCriteria {
  patientId?: string;
  searchText?: string;
  categories?: EventCategory[];
  severities?: EventSeverity[];
  medicationIds?: string[];
  startDate?: Date;
  endDate?: Date;
}

/** True when any criterion would narrow the result. */
export function hasFilters(criteria: MedicalEventSearchCriteria): boolean {
  return (
    (criteria.searchText?.trim() ?? "") !== "" ||
    (criteria.categories?.length ?? 0) > 0 ||
    (criteria.severities?.length ?? 0) > 0 ||
    (criteria.medicationIds?.length ?? 0) > 0 ||
    criteria.startDate !== undefined ||
    criteria.endDate !== undefined
  );
}

/**
 * Apply every search criterion to an in-memory event list.
 */
export function searchEvents(
  events: readonly MedicalEvent[],
  criteria: MedicalEventSearchCriteria
): MedicalEvent[] {
  const matches = allOf<MedicalEvent>(
    byPatient<MedicalEvent>(criteria.patientId),
    containsText(criteria.searchText),
    byCategories(criteria.categories),
    bySeverities(criteria.severities),
    byMedicationIds<MedicalEvent>(criteria.medicationIds)
  );
  return selectEvents(events, criteria.startDate, criteria.endDate).filter(matches);
}
