import type {
  DosageRecord,
  EffectivenessCategory,
  ImpactAnalysis,
  MedicalEvent,
  MedicationPhase,
  MedicationRef,
  WeeklyTrendBucket,
} from "../shared/types.js";
import { administeredChronologically, creditEvents } from "./crediting.js";
import { clamp, percentage, ratio } from "./stats.js";
import { DAY_MS, WEEK_MS } from "./time.js";
import { assertValidRange, selectDosages, selectEvents } from "./time_window.js";

const SYMPTOM_WEIGHT = 0.6;
const ADVERSE_WEIGHT = 0.4;

export interface ImpactInput {
  patientId: string;
  medication: MedicationRef;
  windowStart: Date;
  windowEnd: Date;
  dosages: readonly DosageRecord[];
  events: readonly MedicalEvent[];
  now?: Date;
}

/**
 * Percentage change in symptom rate (events/day) from the first half of the
 * window [start, mid) to the second half [mid, end]. Positive means fewer
 * symptoms later. Clamped to [-100, 100]; 0 when the first half has none.
 */
export function symptomReduction(
  symptomEvents: readonly MedicalEvent[],
  windowStart: Date,
  windowEnd: Date
): number {
  const span = windowEnd.getTime() - windowStart.getTime();
  if (span <= 0) return 0;

  const mid = windowStart.getTime() + span / 2;
  const halfDays = span / 2 / DAY_MS;

  let first = 0;
  let second = 0;
  for (const e of symptomEvents) {
    if (e.eventTime.getTime() < mid) first++;
    else second++;
  }

  const firstRate = first / halfDays;
  const secondRate = second / halfDays;
  if (firstRate === 0) return 0;

  return clamp(((firstRate - secondRate) / firstRate) * 100, -100, 100);
}

/**
 * 60% symptom reduction mapped from [-100, 100] to [0, 1],
 * 40% share of credited events that were not adverse reactions.
 */
export function effectivenessScore(
  symptomReductionPercentage: number,
  adverseReactionEvents: number,
  creditedEvents: number
): number {
  const reductionComponent = (clamp(symptomReductionPercentage, -100, 100) + 100) / 200;
  const adverseComponent = 1 - ratio(adverseReactionEvents, creditedEvents);
  return clamp(SYMPTOM_WEIGHT * reductionComponent + ADVERSE_WEIGHT * adverseComponent, 0, 1);
}

export function categorizeEffectiveness(score: number): EffectivenessCategory {
  if (score >= 0.8) return "EXCELLENT";
  if (score >= 0.6) return "GOOD";
  if (score >= 0.4) return "MODERATE";
  if (score >= 0.2) return "POOR";
  return "INEFFECTIVE";
}

/**
 * Split [windowStart, windowEnd] into 7-day buckets and count credited events
 * per bucket. A bucket is "before_medication" when it starts before `anchor`
 * (or there is no anchor), otherwise "after_medication".
 */
export function buildWeeklyTrends(
  creditedEvents: readonly MedicalEvent[],
  windowStart: Date,
  windowEnd: Date,
  anchor?: Date
): WeeklyTrendBucket[] {
  const from = windowStart.getTime();
  const to = windowEnd.getTime();
  const bucketCount = Math.max(1, Math.ceil((to - from) / WEEK_MS));

  const counts = new Array<number>(bucketCount).fill(0);
  for (const e of creditedEvents) {
    const idx = Math.floor((e.eventTime.getTime() - from) / WEEK_MS);
    counts[clamp(idx, 0, bucketCount - 1)]++;
  }

  return counts.map((eventCount, i) => {
    const start = from + i * WEEK_MS;
    const end = Math.min(start + WEEK_MS, to);
    const phase: MedicationPhase =
      anchor !== undefined && start >= anchor.getTime() ? "after_medication" : "before_medication";
    return {
      week: i + 1,
      start: new Date(start).toISOString(),
      end: new Date(end).toISOString(),
      phase,
      eventCount,
    };
  });
}

/**
 * Before/after impact of a medication over [windowStart, windowEnd].
 *
 * Only this medication's administered dosages and the events inside the window
 * take part; events are credited with the same nearest-preceding-dose rule as
 * the correlation analysis.
 */
export function computeImpact(input: ImpactInput): ImpactAnalysis {
  const { patientId, medication, windowStart, windowEnd } = input;
  assertValidRange(windowStart, windowEnd);

  const dosages = selectDosages(input.dosages, windowStart, windowEnd).filter(
    (d) => d.administered && d.medicationId === medication.id
  );
  const events = selectEvents(input.events, windowStart, windowEnd);
  const credited = creditEvents(dosages, events).map((c) => c.event);

  const symptoms = credited.filter((e) => e.category === "SYMPTOM");
  const adverseReactionEvents = credited.filter((e) => e.category === "ADVERSE_REACTION").length;

  const anchor = medication.startDate ?? administeredChronologically(dosages).at(0)?.administrationTime;
  const weeklyTrends = buildWeeklyTrends(credited, windowStart, windowEnd, anchor);

  const base = {
    medicationId: medication.id,
    medicationName: medication.name,
    patientId,
    analysisPeriodStart: windowStart.toISOString(),
    analysisPeriodEnd: windowEnd.toISOString(),
    weeklyTrends,
    generatedAt: (input.now ?? new Date()).toISOString(),
  };

  if (dosages.length === 0) {
    return {
      ...base,
      totalDosages: 0,
      eventsWithin24Hours: 0,
      eventRatePercentage: 0,
      symptomEvents: 0,
      adverseReactionEvents: 0,
      symptomReductionPercentage: 0,
      effectivenessScore: 0,
    };
  }

  const symptomReductionPercentage = symptomReduction(symptoms, windowStart, windowEnd);

  return {
    ...base,
    totalDosages: dosages.length,
    eventsWithin24Hours: credited.length,
    eventRatePercentage: percentage(credited.length, dosages.length),
    symptomEvents: symptoms.length,
    adverseReactionEvents,
    symptomReductionPercentage,
    effectivenessScore: effectivenessScore(
      symptomReductionPercentage,
      adverseReactionEvents,
      credited.length
    ),
  };
}

// ── Derived accessors ────────────────────────────────────────────────

export function effectivenessCategory(analysis: ImpactAnalysis): EffectivenessCategory {
  return categorizeEffectiveness(analysis.effectivenessScore);
}

export function isHighlyEffective(analysis: ImpactAnalysis): boolean {
  return analysis.effectivenessScore >= 0.7;
}

/** Adverse reactions make up more than 25% of credited events. */
export function hasConcerningSideEffects(analysis: ImpactAnalysis): boolean {
  return ratio(analysis.adverseReactionEvents, analysis.eventsWithin24Hours) > 0.25;
}

export function showsGoodSymptomControl(analysis: ImpactAnalysis): boolean {
  return analysis.symptomReductionPercentage >= 50;
}

export function adverseReactionRate(analysis: ImpactAnalysis): number {
  return percentage(analysis.adverseReactionEvents, analysis.eventsWithin24Hours);
}

export function symptomEventRate(analysis: ImpactAnalysis): number {
  return percentage(analysis.symptomEvents, analysis.eventsWithin24Hours);
}

/** Whole days in the analysis period, rounded down. */
export function analysisPeriodDays(analysis: ImpactAnalysis): number {
  const span = Date.parse(analysis.analysisPeriodEnd) - Date.parse(analysis.analysisPeriodStart);
  return Math.max(0, Math.floor(span / DAY_MS));
}

export function averageDosagesPerDay(analysis: ImpactAnalysis): number {
  return ratio(analysis.totalDosages, analysisPeriodDays(analysis));
}

/** Bucket counts grouped by phase, each list in week order. */
export function weeklyTrendSeries(
  analysis: ImpactAnalysis
): Record<MedicationPhase, number[]> {
  const series: Record<MedicationPhase, number[]> = {
    before_medication: [],
    after_medication: [],
  };
  for (const bucket of analysis.weeklyTrends) {
    series[bucket.phase].push(bucket.eventCount);
  }
  return series;
}
