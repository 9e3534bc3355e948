import type {
  DashboardSummary,
  DosageRecord,
  EventCategory,
  EventSeverity,
  MedicalEvent,
} from "../shared/types.js";
import { percentage, ratio } from "./stats.js";
import {
  countByCategory,
  countBySeverity,
  mostCommonCategory,
  mostCommonSeverity,
} from "./tally.js";
import { NORMALIZATION_DAYS, RECENT_WINDOW_MS, WEEK_MS } from "./time.js";
import { selectDosages, selectEvents } from "./time_window.js";

/** Share of events in the trailing week above which activity is "increased". */
const INCREASED_ACTIVITY_THRESHOLD = 0.3;

/**
 * Patient-level roll-up over the full supplied record set.
 * No time filtering happens here except for the trailing 7-day count.
 */
export function summarizeDashboard(
  patientId: string,
  events: readonly MedicalEvent[],
  dosages: readonly DosageRecord[],
  asOf: Date
): DashboardSummary {
  const cutoff = asOf.getTime() - RECENT_WINDOW_MS;
  const recentEventsLast7Days = events.filter((e) => e.eventTime.getTime() >= cutoff).length;

  return {
    patientId,
    totalEvents: events.length,
    totalDosages: dosages.length,
    eventsByCategory: countByCategory(events),
    eventsBySeverity: countBySeverity(events),
    recentEventsLast7Days,
    generatedAt: asOf.toISOString(),
  };
}

/**
 * Summaries for the trailing `weeks` 7-day windows before `asOf`, keyed
 * week_1 (most recent) to week_N. Every event inside a week counts as recent.
 */
export function weeklySummaries(
  patientId: string,
  events: readonly MedicalEvent[],
  dosages: readonly DosageRecord[],
  asOf: Date,
  weeks: number = 8
): Record<string, DashboardSummary> {
  const summaries: Record<string, DashboardSummary> = {};

  for (let week = 0; week < weeks; week++) {
    const weekEnd = new Date(asOf.getTime() - week * WEEK_MS);
    const weekStart = new Date(weekEnd.getTime() - WEEK_MS);
    const weekEvents = selectEvents(events, weekStart, weekEnd);
    const weekDosages = selectDosages(dosages, weekStart, weekEnd);

    summaries[`week_${week + 1}`] = {
      patientId,
      totalEvents: weekEvents.length,
      totalDosages: weekDosages.length,
      eventsByCategory: countByCategory(weekEvents),
      eventsBySeverity: countBySeverity(weekEvents),
      recentEventsLast7Days: weekEvents.length,
      generatedAt: asOf.toISOString(),
    };
  }

  return summaries;
}

// ── Derived accessors ────────────────────────────────────────────────

/** Total events over a fixed 30-day normalization window. */
export function averageEventsPerDay(summary: DashboardSummary): number {
  return summary.totalEvents / NORMALIZATION_DAYS;
}

/** Total dosages over a fixed 30-day normalization window. */
export function averageDosagesPerDay(summary: DashboardSummary): number {
  return summary.totalDosages / NORMALIZATION_DAYS;
}

export function hasIncreasedRecentActivity(summary: DashboardSummary): boolean {
  if (summary.totalEvents === 0) return false;
  return ratio(summary.recentEventsLast7Days, summary.totalEvents) > INCREASED_ACTIVITY_THRESHOLD;
}

export function dashboardMostCommonCategory(summary: DashboardSummary): EventCategory | null {
  return mostCommonCategory(summary.eventsByCategory);
}

export function dashboardMostCommonSeverity(summary: DashboardSummary): EventSeverity | null {
  return mostCommonSeverity(summary.eventsBySeverity);
}

export function highSeverityEventPercentage(summary: DashboardSummary): number {
  const high = summary.eventsBySeverity.SEVERE + summary.eventsBySeverity.CRITICAL;
  return percentage(high, summary.totalEvents);
}
