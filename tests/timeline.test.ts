import { describe, it, expect } from "vitest";
import {
  DOSAGE_DESCRIPTION,
  analyzeTimeline,
  buildTimeline,
  formatPointValue,
  highSeverityPoints,
  identifyTimelinePatterns,
  timelineStatistics,
} from "../src/analytics/timeline.js";
import { InvalidRangeError } from "../src/shared/errors.js";
import { PATIENT, at, dosage, event } from "./fixtures.js";

describe("Timeline merge", () => {
  it("orders by time and puts a dose before an event at the same instant", () => {
    const points = buildTimeline(
      [dosage("d1", at(2)), dosage("d2", at(0))],
      [event("e1", at(2)), event("e0", at(1))]
    );

    expect(points.map((p) => p.kind)).toEqual(["DOSAGE", "EVENT", "DOSAGE", "EVENT"]);
    expect(points.map((p) => p.timestamp)).toEqual([
      "2024-03-01T08:00:00.000Z",
      "2024-03-01T09:00:00.000Z",
      "2024-03-01T10:00:00.000Z",
      "2024-03-01T10:00:00.000Z",
    ]);
  });

  it("keeps input order for records of the same kind at the same instant", () => {
    const points = buildTimeline(
      [],
      [
        event("e1", at(1), "SYMPTOM", "MILD", { title: "First" }),
        event("e2", at(1), "SYMPTOM", "MILD", { title: "Second" }),
      ]
    );
    expect(points.map((p) => p.description)).toEqual(["First", "Second"]);
  });

  it("is deterministic for the same inputs", () => {
    const dosages = [dosage("d1", at(3)), dosage("d2", at(1))];
    const events = [event("e1", at(1)), event("e2", at(3))];
    expect(buildTimeline(dosages, events)).toEqual(buildTimeline(dosages, events));
  });

  it("describes dosages and events", () => {
    const [dose, withDetail, titleOnly] = buildTimeline(
      [dosage("d1", at(0), { amount: 250, unit: "mg" })],
      [
        event("e1", at(1), "SYMPTOM", "SEVERE", {
          title: "Headache",
          description: " throbbing, left side ",
        }),
        event("e2", at(2), "OBSERVATION", "MILD", { title: "Calm", description: "   " }),
      ]
    );

    expect(dose).toEqual({
      timestamp: "2024-03-01T08:00:00.000Z",
      kind: "DOSAGE",
      description: DOSAGE_DESCRIPTION,
      value: 250,
      unit: "mg",
      severity: null,
    });
    expect(withDetail.description).toBe("Headache: throbbing, left side");
    expect(withDetail.severity).toBe("SEVERE");
    expect(withDetail.value).toBeNull();
    expect(titleOnly.description).toBe("Calm");
  });

  it("includes dosages that were not administered", () => {
    const points = buildTimeline([dosage("d1", at(0), { administered: false })], []);
    expect(points).toHaveLength(1);
  });
});

describe("Timeline helpers", () => {
  const points = buildTimeline(
    [dosage("d1", at(0)), dosage("d2", at(24))],
    [
      event("e1", at(5), "EMERGENCY", "CRITICAL"),
      event("e2", at(77), "SYMPTOM", "MILD"),
    ]
  );

  it("computes counts and whole-day span", () => {
    expect(timelineStatistics(points)).toEqual({
      totalDataPoints: 4,
      eventCount: 2,
      dosageCount: 2,
      timeSpanDays: 3,
    });
  });

  it("statistics of an empty timeline are all zero", () => {
    expect(timelineStatistics([])).toEqual({
      totalDataPoints: 0,
      eventCount: 0,
      dosageCount: 0,
      timeSpanDays: 0,
    });
  });

  it("selects high-severity points", () => {
    expect(highSeverityPoints(points).map((p) => p.timestamp)).toEqual([
      "2024-03-01T13:00:00.000Z",
    ]);
  });

  it("formats quantitative values", () => {
    expect(formatPointValue(points[0])).toBe("500 mg");
    expect(formatPointValue(points[1])).toBe("");
  });

  it("notices event-heavy and dose-heavy periods", () => {
    const eventHeavy = buildTimeline(
      [dosage("d1", at(0)), dosage("d2", at(1))],
      [event("e1", at(2)), event("e2", at(3)), event("e3", at(4)), event("e4", at(5))]
    );
    expect(identifyTimelinePatterns(eventHeavy)).toEqual([
      "High event frequency relative to medication dosages",
    ]);

    const doseHeavy = buildTimeline(
      [0, 1, 2, 3, 4].map((h) => dosage(`d${h}`, at(h))),
      [event("e1", at(6)), event("e2", at(7))]
    );
    expect(identifyTimelinePatterns(doseHeavy)).toEqual([
      "Consistent medication administration with low event frequency",
    ]);
  });

  it("notices dense periods", () => {
    const dense = buildTimeline(
      [0, 1, 2, 3, 4, 5].map((h) => dosage(`d${h}`, at(h))),
      [6, 7, 8, 9, 10].map((h) => event(`e${h}`, at(h)))
    );
    expect(identifyTimelinePatterns(dense)).toEqual([
      "Dense activity period with multiple data points",
    ]);
    expect(identifyTimelinePatterns([])).toEqual([]);
  });
});

describe("Timeline analysis", () => {
  const now = new Date("2024-03-20T00:00:00.000Z");

  it("restricts both streams to the window", () => {
    const analysis = analyzeTimeline(
      PATIENT,
      at(0),
      at(24),
      [dosage("d1", at(-1)), dosage("d2", at(12))],
      [event("e1", at(24)), event("e2", at(25))],
      now
    );

    expect(analysis.dataPoints.map((p) => p.kind)).toEqual(["DOSAGE", "EVENT"]);
    expect(analysis.periodStart).toBe("2024-03-01T08:00:00.000Z");
    expect(analysis.periodEnd).toBe("2024-03-02T08:00:00.000Z");
    expect(analysis.generatedAt).toBe("2024-03-20T00:00:00.000Z");
  });

  it("returns an empty timeline for an empty window", () => {
    const analysis = analyzeTimeline(PATIENT, at(100), at(200), [dosage("d1", at(0))], [], now);
    expect(analysis.dataPoints).toEqual([]);
  });

  it("rejects an inverted window", () => {
    expect(() => analyzeTimeline(PATIENT, at(24), at(0), [], [], now)).toThrow(InvalidRangeError);
  });
});
