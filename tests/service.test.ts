import { describe, it, expect } from "vitest";
import { AnalyticsService } from "../src/api/analytics_service.js";
import { RangeQuerySchema, WeeksQuerySchema, parseQuery, statusFor } from "../src/api/routes.js";
import { DosageRecordSchema } from "../src/records/schemas.js";
import { InMemoryRecordSource } from "../src/records/source.js";
import { InvalidQueryError, InvalidRangeError } from "../src/shared/errors.js";
import { PATIENT, T0, at, dosage, event } from "./fixtures.js";

const now = new Date("2024-03-05T08:00:00.000Z");

function seeded(): InMemoryRecordSource {
  const source = new InMemoryRecordSource();
  source.addMedication(PATIENT, { id: "med-a", name: "Metformin" });
  source.addDosage(dosage("d1", T0));
  source.addDosage(dosage("d2", at(12)));
  source.addDosage(dosage("d3", at(30), { medicationId: "med-b" }));
  source.addEvent(event("e1", at(2), "SYMPTOM", "MODERATE"));
  source.addEvent(event("e2", at(40), "ADVERSE_REACTION", "SEVERE"));
  source.addEvent(event("e3", at(90), "APPOINTMENT", "MILD", { patientId: "patient-2" }));
  return source;
}

describe("Analytics service", () => {
  const service = new AnalyticsService(seeded(), () => now);

  it("summarizes the patient's dashboard", async () => {
    const summary = await service.dashboard(PATIENT);
    expect(summary.totalEvents).toBe(2);
    expect(summary.totalDosages).toBe(3);
    expect(summary.recentEventsLast7Days).toBe(2);
    expect(summary.generatedAt).toBe("2024-03-05T08:00:00.000Z");
  });

  it("correlates one medication", async () => {
    const result = await service.correlation(PATIENT, "med-a");
    expect(result.medicationName).toBe("Metformin");
    expect(result.totalDosages).toBe(2);
    expect(result.eventsAfterDosage).toBe(1);
    expect(result.correlationPercentage).toBe(50);
  });

  it("names medications the patient has no record of as unknown", async () => {
    const result = await service.correlation(PATIENT, "med-z");
    expect(result.medicationName).toBe("Unknown Medication");
    expect(result.totalDosages).toBe(0);
  });

  it("correlates every medication with dosages", async () => {
    const results = await service.allCorrelations(PATIENT);
    expect(results.map((r) => [r.medicationId, r.eventsAfterDosage])).toEqual([
      ["med-a", 1],
      ["med-b", 1],
    ]);
  });

  it("builds a timeline for a window", async () => {
    const timeline = await service.timeline(PATIENT, T0, at(24));
    expect(timeline.dataPoints.map((p) => p.kind)).toEqual(["DOSAGE", "EVENT", "DOSAGE"]);
  });

  it("rejects an inverted timeline window", async () => {
    await expect(service.timeline(PATIENT, at(24), T0)).rejects.toBeInstanceOf(InvalidRangeError);
  });

  it("analyzes impact over a window", async () => {
    const impact = await service.impact(PATIENT, "med-a", T0, at(48));
    expect(impact.totalDosages).toBe(2);
    expect(impact.eventsWithin24Hours).toBe(1);
    expect(impact.symptomEvents).toBe(1);
  });

  it("combines dashboard, correlations and weekly summaries", async () => {
    const overview = await service.overview(PATIENT);
    expect(overview.dashboard.totalEvents).toBe(2);
    expect(overview.correlations).toHaveLength(2);
    expect(Object.keys(overview.weeklyTrends)).toHaveLength(8);
  });

  it("returns zero-valued results for an unknown patient", async () => {
    const summary = await service.dashboard("nobody");
    expect(summary.totalEvents).toBe(0);
    expect(await service.allCorrelations("nobody")).toEqual([]);
  });
});

describe("Request validation", () => {
  it("parses ISO date-time query parameters", () => {
    const { startDate, endDate } = RangeQuerySchema.parse({
      startDate: "2024-03-01T00:00:00Z",
      endDate: "2024-03-02T00:00:00+02:00",
    });
    expect(startDate.toISOString()).toBe("2024-03-01T00:00:00.000Z");
    expect(endDate.toISOString()).toBe("2024-03-01T22:00:00.000Z");
  });

  it("reads date-times without an offset as UTC", () => {
    const { startDate, endDate } = RangeQuerySchema.parse({
      startDate: "2024-01-01T00:00:00",
      endDate: "2024-01-02T12:30:00",
    });
    expect(startDate.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(endDate.toISOString()).toBe("2024-01-02T12:30:00.000Z");
  });

  it("maps request problems to 400 and everything else to 500", () => {
    let queryError: unknown;
    try {
      parseQuery(RangeQuerySchema, { startDate: "yesterday" });
    } catch (err) {
      queryError = err;
    }
    expect(queryError).toBeInstanceOf(InvalidQueryError);
    expect(statusFor(queryError)).toBe(400);
    expect(statusFor(new InvalidRangeError(at(1), at(0)))).toBe(400);
    expect(statusFor(new Error("connection refused"))).toBe(500);
  });

  it("treats a stored record that fails validation as a server fault", () => {
    const row = DosageRecordSchema.safeParse({ ...dosage("d1", T0), schedule: "WEEKLY" });
    expect(row.success).toBe(false);
    if (!row.success) expect(statusFor(row.error)).toBe(500);
  });

  it("bounds the number of weeks", () => {
    expect(WeeksQuerySchema.parse({ weeks: "4" }).weeks).toBe(4);
    expect(WeeksQuerySchema.parse({}).weeks).toBeUndefined();
    expect(WeeksQuerySchema.safeParse({ weeks: "0" }).success).toBe(false);
  });
});
