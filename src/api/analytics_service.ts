import type {
  CorrelationResult,
  DashboardSummary,
  ImpactAnalysis,
  MedicationRef,
  TimelineAnalysis,
} from "../shared/types.js";
import { computeCorrelation, UNKNOWN_MEDICATION_NAME } from "../analytics/correlation.js";
import { summarizeDashboard, weeklySummaries } from "../analytics/dashboard.js";
import { computeImpact } from "../analytics/impact.js";
import { analyzeTimeline } from "../analytics/timeline.js";
import { assertValidRange } from "../analytics/time_window.js";
import type { RecordSource } from "../records/source.js";

export interface PatientOverview {
  dashboard: DashboardSummary;
  correlations: CorrelationResult[];
  weeklyTrends: Record<string, DashboardSummary>;
}

/**
 * Fetches a patient's records from a RecordSource and hands them to the
 * analyzers. `clock` supplies "now" and is replaced in tests.
 */
export class AnalyticsService {
  constructor(
    private readonly source: RecordSource,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async dashboard(patientId: string): Promise<DashboardSummary> {
    const [events, dosages] = await Promise.all([
      this.source.fetchEvents(patientId),
      this.source.fetchDosages(patientId),
    ]);
    return summarizeDashboard(patientId, events, dosages, this.clock());
  }

  async weeklyTrends(patientId: string, weeks?: number): Promise<Record<string, DashboardSummary>> {
    const [events, dosages] = await Promise.all([
      this.source.fetchEvents(patientId),
      this.source.fetchDosages(patientId),
    ]);
    return weeklySummaries(patientId, events, dosages, this.clock(), weeks);
  }

  async correlation(patientId: string, medicationId: string): Promise<CorrelationResult> {
    const [medication, dosages, events] = await Promise.all([
      this.resolveMedication(patientId, medicationId),
      this.source.fetchDosages(patientId, { medicationId }),
      this.source.fetchEvents(patientId),
    ]);
    return computeCorrelation({ patientId, medication, dosages, events, now: this.clock() });
  }

  /** One correlation per medication with recorded dosages, run concurrently. */
  async allCorrelations(patientId: string): Promise<CorrelationResult[]> {
    const [medicationIds, events] = await Promise.all([
      this.source.listMedicationIds(patientId),
      this.source.fetchEvents(patientId),
    ]);
    const now = this.clock();

    return Promise.all(
      medicationIds.map(async (medicationId) => {
        const [medication, dosages] = await Promise.all([
          this.resolveMedication(patientId, medicationId),
          this.source.fetchDosages(patientId, { medicationId }),
        ]);
        return computeCorrelation({ patientId, medication, dosages, events, now });
      })
    );
  }

  async timeline(patientId: string, start: Date, end: Date): Promise<TimelineAnalysis> {
    assertValidRange(start, end);
    const [dosages, events] = await Promise.all([
      this.source.fetchDosages(patientId, { start, end }),
      this.source.fetchEvents(patientId, { start, end }),
    ]);
    return analyzeTimeline(patientId, start, end, dosages, events, this.clock());
  }

  async impact(
    patientId: string,
    medicationId: string,
    windowStart: Date,
    windowEnd: Date
  ): Promise<ImpactAnalysis> {
    assertValidRange(windowStart, windowEnd);
    const [medication, dosages, events] = await Promise.all([
      this.resolveMedication(patientId, medicationId),
      this.source.fetchDosages(patientId, { medicationId, start: windowStart, end: windowEnd }),
      this.source.fetchEvents(patientId, { start: windowStart, end: windowEnd }),
    ]);
    return computeImpact({
      patientId,
      medication,
      windowStart,
      windowEnd,
      dosages,
      events,
      now: this.clock(),
    });
  }

  async overview(patientId: string): Promise<PatientOverview> {
    const [dashboard, correlations, weeklyTrends] = await Promise.all([
      this.dashboard(patientId),
      this.allCorrelations(patientId),
      this.weeklyTrends(patientId),
    ]);
    return { dashboard, correlations, weeklyTrends };
  }

  private async resolveMedication(patientId: string, medicationId: string): Promise<MedicationRef> {
    const found = await this.source.findMedication(patientId, medicationId);
    return found ?? { id: medicationId, name: UNKNOWN_MEDICATION_NAME };
  }
}
