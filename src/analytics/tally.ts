import { EVENT_CATEGORIES, EVENT_SEVERITIES } from "../shared/types.js";
import type {
  CategoryCounts,
  EventCategory,
  EventSeverity,
  MedicalEvent,
  SeverityCounts,
} from "../shared/types.js";

export function emptyCategoryCounts(): CategoryCounts {
  return {
    SYMPTOM: 0,
    MEDICATION: 0,
    APPOINTMENT: 0,
    TEST: 0,
    EMERGENCY: 0,
    OBSERVATION: 0,
    ADVERSE_REACTION: 0,
  };
}

export function emptySeverityCounts(): SeverityCounts {
  return { MILD: 0, MODERATE: 0, SEVERE: 0, CRITICAL: 0 };
}

export function countByCategory(events: readonly MedicalEvent[]): CategoryCounts {
  const counts = emptyCategoryCounts();
  for (const e of events) counts[e.category]++;
  return counts;
}

export function countBySeverity(events: readonly MedicalEvent[]): SeverityCounts {
  const counts = emptySeverityCounts();
  for (const e of events) counts[e.severity]++;
  return counts;
}

/**
 * Key with the highest count. Ties go to the key declared first in `order`.
 * Returns null when every count is zero.
 */
export function argmax<K extends string>(
  counts: Readonly<Record<K, number>>,
  order: readonly K[]
): K | null {
  let best: K | null = null;
  let bestCount = 0;
  for (const key of order) {
    if (counts[key] > bestCount) {
      best = key;
      bestCount = counts[key];
    }
  }
  return best;
}

export function mostCommonCategory(counts: CategoryCounts): EventCategory | null {
  return argmax(counts, EVENT_CATEGORIES);
}

export function mostCommonSeverity(counts: SeverityCounts): EventSeverity | null {
  return argmax(counts, EVENT_SEVERITIES);
}

export function isHighSeverity(severity: EventSeverity | null): boolean {
  return severity === "SEVERE" || severity === "CRITICAL";
}
