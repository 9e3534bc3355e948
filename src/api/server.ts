import "dotenv/config";
import express from "express";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "../shared/config.js";
import type { RecordSource } from "../records/source.js";
import { AnalyticsService } from "./analytics_service.js";
import { analyticsRouter } from "./routes.js";

export function createApp(source: RecordSource, clock?: () => Date): express.Express {
  const app = express();
  app.use(express.json());
  app.use("/api/analytics", analyticsRouter(new AnalyticsService(source, clock)));
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  return app;
}

// ── Start server ────────────────────────────────────────────────
export async function startServer() {
  const { port } = loadConfig();
  const { db } = await import("../db/connection.js");
  const { DrizzleRecordSource } = await import("../records/drizzle_source.js");

  const app = createApp(new DrizzleRecordSource(db));
  return app.listen(port, () => {
    console.log(`Medication analytics API running on port ${port}`);
  });
}

// Start if run directly
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  startServer().catch((err: unknown) => {
    console.error("Server failed to start:", err);
    process.exit(1);
  });
}
