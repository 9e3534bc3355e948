import { describe, it, expect } from "vitest";
import {
  assertValidRange,
  byMedicationIds,
  containsText,
  hasFilters,
  searchEvents,
  selectDosages,
  selectEvents,
} from "../src/analytics/time_window.js";
import { periodDays } from "../src/analytics/time.js";
import { InvalidRangeError } from "../src/shared/errors.js";
import { PATIENT, at, dosage, event } from "./fixtures.js";

describe("Time window selection", () => {
  const events = [
    event("e1", at(0)),
    event("e2", at(24)),
    event("e3", at(48)),
    event("e4", at(72)),
  ];

  it("keeps records inside an inclusive window, in input order", () => {
    const selected = selectEvents(events, at(24), at(48));
    expect(selected.map((e) => e.id)).toEqual(["e2", "e3"]);
  });

  it("treats a missing bound as unbounded", () => {
    expect(selectEvents(events, at(48)).map((e) => e.id)).toEqual(["e3", "e4"]);
    expect(selectEvents(events, undefined, at(24)).map((e) => e.id)).toEqual(["e1", "e2"]);
    expect(selectEvents(events)).toHaveLength(4);
  });

  it("a single-instant window keeps only records at that instant", () => {
    expect(selectEvents(events, at(24), at(24)).map((e) => e.id)).toEqual(["e2"]);
  });

  it("rejects a window whose start is after its end", () => {
    expect(() => selectEvents(events, at(48), at(24))).toThrow(InvalidRangeError);
    expect(() => assertValidRange(at(1), at(0))).toThrow(
      "Invalid date range: start 2024-03-01T09:00:00.000Z is after end 2024-03-01T08:00:00.000Z"
    );
  });

  it("never mutates its input", () => {
    const dosages = [dosage("d2", at(5)), dosage("d1", at(1))];
    const before = dosages.map((d) => d.id);
    selectDosages(dosages, at(0), at(10));
    expect(dosages.map((d) => d.id)).toEqual(before);
  });
});

describe("Event search", () => {
  const events = [
    event("e1", at(0), "SYMPTOM", "MILD", { title: "Headache", medicationId: "med-a" }),
    event("e2", at(1), "ADVERSE_REACTION", "SEVERE", {
      title: "Rash",
      description: "Itchy patches on forearm",
      medicationId: "med-b",
    }),
    event("e3", at(2), "TEST", "MILD", { title: "Blood panel", patientId: "patient-2" }),
  ];

  it("matches text in title or description, ignoring case", () => {
    expect(searchEvents(events, { searchText: "FOREARM" }).map((e) => e.id)).toEqual(["e2"]);
    expect(searchEvents(events, { searchText: "headache" }).map((e) => e.id)).toEqual(["e1"]);
  });

  it("combines criteria with AND", () => {
    const found = searchEvents(events, {
      patientId: PATIENT,
      severities: ["MILD", "SEVERE"],
      categories: ["SYMPTOM"],
    });
    expect(found.map((e) => e.id)).toEqual(["e1"]);
  });

  it("events without a medication never match a medication filter", () => {
    const matches = byMedicationIds(["med-a"]);
    expect(events.filter(matches).map((e) => e.id)).toEqual(["e1"]);
  });

  it("blank text matches everything", () => {
    expect(events.filter(containsText("   "))).toHaveLength(3);
  });

  it("reports whether any criterion narrows the result", () => {
    expect(hasFilters({})).toBe(false);
    expect(hasFilters({ searchText: "  ", categories: [] })).toBe(false);
    expect(hasFilters({ startDate: at(0) })).toBe(true);
  });
});

describe("Period length", () => {
  it("rounds partial days up", () => {
    expect(periodDays(at(0), at(36))).toBe(2);
    expect(periodDays(at(0), at(24))).toBe(1);
  });

  it("is 0 for an empty or reversed span", () => {
    expect(periodDays(at(5), at(5))).toBe(0);
    expect(periodDays(at(5), at(0))).toBe(0);
  });
});
