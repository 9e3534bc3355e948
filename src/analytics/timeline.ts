import type {
  DosageRecord,
  MedicalEvent,
  TimelineAnalysis,
  TimelinePoint,
  TimelinePointKind,
  TimelineStatistics,
} from "../shared/types.js";
import { isHighSeverity } from "./tally.js";
import { DAY_MS } from "./time.js";
import { selectDosages, selectEvents } from "./time_window.js";

export { periodDays } from "./time.js";

export const DOSAGE_DESCRIPTION = "Medication dose administered";

/** Sort rank on equal timestamps: a dose precedes the reaction it may cause. */
const KIND_RANK: Record<TimelinePointKind, number> = { DOSAGE: 0, EVENT: 1 };

interface SortablePoint {
  time: number;
  point: TimelinePoint;
}

function dosagePoint(d: DosageRecord): SortablePoint {
  return {
    time: d.administrationTime.getTime(),
    point: {
      timestamp: d.administrationTime.toISOString(),
      kind: "DOSAGE",
      description: DOSAGE_DESCRIPTION,
      value: d.amount,
      unit: d.unit,
      severity: null,
    },
  };
}

function eventPoint(e: MedicalEvent): SortablePoint {
  const detail = e.description?.trim();
  return {
    time: e.eventTime.getTime(),
    point: {
      timestamp: e.eventTime.toISOString(),
      kind: "EVENT",
      description: detail ? `${e.title}: ${detail}` : e.title,
      value: null,
      unit: null,
      severity: e.severity,
    },
  };
}

/**
 * Merge dosages and events into one chronological sequence.
 * Ascending by timestamp; DOSAGE before EVENT on equal timestamps; input order
 * otherwise. Same inputs always give the same sequence.
 */
export function buildTimeline(
  dosages: readonly DosageRecord[],
  events: readonly MedicalEvent[]
): TimelinePoint[] {
  const points = [...dosages.map(dosagePoint), ...events.map(eventPoint)];
  points.sort(
    (a, b) => a.time - b.time || KIND_RANK[a.point.kind] - KIND_RANK[b.point.kind]
  );
  return points.map((p) => p.point);
}

export function dosagePoints(points: readonly TimelinePoint[]): TimelinePoint[] {
  return points.filter((p) => p.kind === "DOSAGE");
}

export function eventPoints(points: readonly TimelinePoint[]): TimelinePoint[] {
  return points.filter((p) => p.kind === "EVENT");
}

export function highSeverityPoints(points: readonly TimelinePoint[]): TimelinePoint[] {
  return points.filter((p) => isHighSeverity(p.severity));
}

/** "500 mg", "500", or "" for points without a quantitative value. */
export function formatPointValue(point: TimelinePoint): string {
  if (point.value === null) return "";
  const unit = point.unit?.trim();
  return unit ? `${point.value} ${unit}` : String(point.value);
}

/**
 * Counts per kind, plus whole days between the first and last point.
 * Expects a chronologically ordered list, as returned by buildTimeline.
 */
export function timelineStatistics(points: readonly TimelinePoint[]): TimelineStatistics {
  const dosageCount = dosagePoints(points).length;
  const eventCount = eventPoints(points).length;

  let timeSpanDays = 0;
  if (points.length > 0) {
    const first = Date.parse(points[0].timestamp);
    const last = Date.parse(points[points.length - 1].timestamp);
    timeSpanDays = Math.floor((last - first) / DAY_MS);
  }

  return { totalDataPoints: points.length, eventCount, dosageCount, timeSpanDays };
}

/** Short textual observations about event/dose balance and density. */
export function identifyTimelinePatterns(points: readonly TimelinePoint[]): string[] {
  const patterns: string[] = [];
  if (points.length === 0) return patterns;

  const { eventCount, dosageCount } = timelineStatistics(points);

  if (eventCount > dosageCount * 1.5) {
    patterns.push("High event frequency relative to medication dosages");
  } else if (dosageCount > eventCount * 2) {
    patterns.push("Consistent medication administration with low event frequency");
  }

  if (points.length > 10) {
    patterns.push("Dense activity period with multiple data points");
  }

  return patterns;
}

/**
 * Timeline of both streams restricted to [start, end].
 */
export function analyzeTimeline(
  patientId: string,
  start: Date,
  end: Date,
  dosages: readonly DosageRecord[],
  events: readonly MedicalEvent[],
  now: Date = new Date()
): TimelineAnalysis {
  const dataPoints = buildTimeline(
    selectDosages(dosages, start, end),
    selectEvents(events, start, end)
  );
  return {
    patientId,
    periodStart: start.toISOString(),
    periodEnd: end.toISOString(),
    dataPoints,
    generatedAt: now.toISOString(),
  };
}
