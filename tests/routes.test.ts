import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { createApp } from "../src/api/server.js";
import { InMemoryRecordSource } from "../src/records/source.js";
import { PATIENT, at, dosage, event } from "./fixtures.js";

const now = new Date("2024-03-05T08:00:00.000Z");

describe("Analytics API", () => {
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    const source = new InMemoryRecordSource();
    source.addDosage(dosage("d1", at(0)));
    source.addEvent(event("e1", at(2), "SYMPTOM", "MODERATE"));

    server = createApp(source, () => now).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}/api/analytics`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  it("serves a patient's dashboard", async () => {
    const res = await fetch(`${baseUrl}/dashboard/${PATIENT}`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      patientId: PATIENT,
      totalEvents: 1,
      totalDosages: 1,
      recentEventsLast7Days: 1,
      generatedAt: "2024-03-05T08:00:00.000Z",
    });
  });

  it("answers 400 for an inverted range", async () => {
    const res = await fetch(
      `${baseUrl}/timeline/${PATIENT}?startDate=2024-03-02T00:00:00Z&endDate=2024-03-01T00:00:00Z`
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error:
        "Invalid date range: start 2024-03-02T00:00:00.000Z is after end 2024-03-01T00:00:00.000Z",
    });
  });

  it("answers 400 for a missing query parameter", async () => {
    const res = await fetch(`${baseUrl}/timeline/${PATIENT}?startDate=2024-03-01T00:00:00Z`);
    expect(res.status).toBe(400);
  });
});
