/**
 * Analytics API Routes
 *
 * Read-only endpoints over a patient's dosage and event history. Mounted at
 * /api/analytics by the server.
 */

import { Router, type Response } from "express";
import { z } from "zod";
import { InvalidQueryError, InvalidRangeError, errorMessage } from "../shared/errors.js";
import type { AnalyticsService } from "./analytics_service.js";

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

// Date-times without an offset are read as UTC.
const isoInstant = z
  .string()
  .datetime({ offset: true, local: true })
  .transform((s) => new Date(HAS_ZONE.test(s) ? s : `${s}Z`));

export const RangeQuerySchema = z.object({
  startDate: isoInstant,
  endDate: isoInstant,
});

export const WeeksQuerySchema = z.object({
  weeks: z.coerce.number().int().min(1).max(52).optional(),
});

/** Parse query parameters, throwing InvalidQueryError on failure. */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: unknown): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidQueryError(`Invalid query: ${issues.join("; ")}`);
  }
  return result.data;
}

/** 400 for problems with the request itself, 500 for everything else. */
export function statusFor(err: unknown): number {
  if (err instanceof InvalidRangeError || err instanceof InvalidQueryError) return 400;
  return 500;
}

function fail(res: Response, route: string, err: unknown): void {
  const status = statusFor(err);
  console.error(`[analytics] ${route} failed (${status}):`, errorMessage(err));
  res.status(status).json({ error: errorMessage(err) });
}

export function analyticsRouter(service: AnalyticsService): Router {
  const router = Router();

  // ── GET /dashboard/:patientId ───────────────────────────────────
  router.get("/dashboard/:patientId", async (req, res) => {
    try {
      res.json(await service.dashboard(req.params.patientId));
    } catch (err) {
      fail(res, "dashboard", err);
    }
  });

  // ── GET /correlation/:patientId/medication/:medicationId ────────
  router.get("/correlation/:patientId/medication/:medicationId", async (req, res) => {
    try {
      res.json(await service.correlation(req.params.patientId, req.params.medicationId));
    } catch (err) {
      fail(res, "correlation", err);
    }
  });

  // ── GET /correlation/:patientId/all-medications ─────────────────
  router.get("/correlation/:patientId/all-medications", async (req, res) => {
    try {
      res.json(await service.allCorrelations(req.params.patientId));
    } catch (err) {
      fail(res, "all-medications", err);
    }
  });

  // ── GET /timeline/:patientId ────────────────────────────────────
  router.get("/timeline/:patientId", async (req, res) => {
    try {
      const { startDate, endDate } = parseQuery(RangeQuerySchema, req.query);
      res.json(await service.timeline(req.params.patientId, startDate, endDate));
    } catch (err) {
      fail(res, "timeline", err);
    }
  });

  // ── GET /impact/:patientId/medication/:medicationId ─────────────
  router.get("/impact/:patientId/medication/:medicationId", async (req, res) => {
    try {
      const { startDate, endDate } = parseQuery(RangeQuerySchema, req.query);
      res.json(
        await service.impact(req.params.patientId, req.params.medicationId, startDate, endDate)
      );
    } catch (err) {
      fail(res, "impact", err);
    }
  });

  // ── GET /weekly-trends/:patientId ───────────────────────────────
  router.get("/weekly-trends/:patientId", async (req, res) => {
    try {
      const { weeks } = parseQuery(WeeksQuerySchema, req.query);
      res.json(await service.weeklyTrends(req.params.patientId, weeks));
    } catch (err) {
      fail(res, "weekly-trends", err);
    }
  });

  // ── GET /overview/:patientId ────────────────────────────────────
  router.get("/overview/:patientId", async (req, res) => {
    try {
      res.json(await service.overview(req.params.patientId));
    } catch (err) {
      fail(res, "overview", err);
    }
  });

  return router;
}
