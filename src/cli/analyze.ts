#!/usr/bin/env tsx
/**
 * CLI: analyze
 *
 * Usage: npm run analyze -- <command> --patient <id> --dosages <file> --events <file> [options]
 *
 * Commands: correlation | timeline | dashboard | impact
 *
 * Options:
 *   --medication <id>          required for correlation and impact
 *   --medication-name <name>   display name for the medication
 *   --medication-start <iso>   date the patient started the medication
 *   --start <iso> --end <iso>  analysis window (timeline, impact)
 *   --as-of <iso>              reference "now" (or ANALYTICS_AS_OF)
 *
 * Records are read from JSON or CSV files; rows that fail validation are
 * reported on stderr and skipped.
 */

import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import { AnalyticsService } from "../api/analytics_service.js";
import { InMemoryRecordSource } from "../records/source.js";
import { UNKNOWN_MEDICATION_NAME } from "../analytics/correlation.js";
import { loadDosages, loadEvents } from "../records/loader.js";
import { futureEventIssues, type RecordIssue } from "../records/schemas.js";
import { resolveSetting } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";

export const COMMANDS = ["correlation", "timeline", "dashboard", "impact"] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  command: Command;
  patientId: string;
  dosagesFile?: string;
  eventsFile?: string;
  medicationId?: string;
  medicationName?: string;
  medicationStart?: Date;
  start?: Date;
  end?: Date;
  asOf: Date;
}

export const USAGE =
  "Usage: npm run analyze -- <correlation|timeline|dashboard|impact> --patient <id> " +
  "--dosages <file> --events <file> [--medication <id>] [--start <iso>] [--end <iso>] [--as-of <iso>]";

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseDate(flag: string, value: string): Date {
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`${flag}: "${value}" is not a valid date`);
  }
  return d;
}

/**
 * Parse command-line arguments. Throws with a readable message on missing
 * or malformed values.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const flags = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (i + 1 >= args.length) throw new Error(`Missing value for ${arg}`);
      flags.set(arg.slice(2), args[i + 1]);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const command = positional[0];
  if (command === undefined || !isCommand(command)) {
    throw new Error(USAGE);
  }

  const patientId = flags.get("patient");
  if (!patientId) throw new Error("--patient is required");

  const medicationId = flags.get("medication");
  if ((command === "correlation" || command === "impact") && !medicationId) {
    throw new Error(`--medication is required for ${command}`);
  }

  const rawStart = flags.get("start");
  const rawEnd = flags.get("end");
  if ((command === "timeline" || command === "impact") && (!rawStart || !rawEnd)) {
    throw new Error(`--start and --end are required for ${command}`);
  }

  const rawMedicationStart = flags.get("medication-start");
  const asOf = resolveSetting(flags.get("as-of"), env.ANALYTICS_AS_OF, "");

  return {
    command,
    patientId,
    dosagesFile: flags.get("dosages"),
    eventsFile: flags.get("events"),
    medicationId,
    medicationName: flags.get("medication-name"),
    medicationStart: rawMedicationStart ? parseDate("--medication-start", rawMedicationStart) : undefined,
    start: rawStart ? parseDate("--start", rawStart) : undefined,
    end: rawEnd ? parseDate("--end", rawEnd) : undefined,
    asOf: asOf ? parseDate("--as-of", asOf) : new Date(),
  };
}

function reportIssues(label: string, issues: readonly RecordIssue[]): void {
  for (const e of [...issues].sort((a, b) => a.index - b.index)) {
    console.error(`  ${label}[${e.index}]: ${e.issues.join("; ")}`);
  }
}

/** Load the record files into an in-memory source and run one command. */
export async function runCommand(options: CliOptions): Promise<unknown> {
  const source = new InMemoryRecordSource();

  if (options.dosagesFile) {
    const dosages = loadDosages(options.dosagesFile);
    reportIssues("dosages", dosages.errors);
    dosages.records.forEach((d) => source.addDosage(d));
  }

  if (options.eventsFile) {
    const events = loadEvents(options.eventsFile);
    const future = futureEventIssues(events.records, options.asOf, events.rows);
    reportIssues("events", [...events.errors, ...future]);
    const rejected = new Set(future.map((f) => f.index));
    events.records.forEach((e, i) => {
      if (!rejected.has(events.rows[i])) source.addEvent(e);
    });
  }

  if (options.medicationId && (options.medicationName || options.medicationStart)) {
    source.addMedication(options.patientId, {
      id: options.medicationId,
      name: options.medicationName ?? UNKNOWN_MEDICATION_NAME,
      startDate: options.medicationStart,
    });
  }

  const service = new AnalyticsService(source, () => options.asOf);
  const medicationId = options.medicationId ?? "";

  switch (options.command) {
    case "dashboard":
      return service.dashboard(options.patientId);
    case "correlation":
      return service.correlation(options.patientId, medicationId);
    case "timeline":
      return service.timeline(options.patientId, options.start ?? options.asOf, options.end ?? options.asOf);
    case "impact":
      return service.impact(
        options.patientId,
        medicationId,
        options.start ?? options.asOf,
        options.end ?? options.asOf
      );
  }
}

async function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }

  try {
    const result = await runCommand(options);
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    console.error(`✗ ${options.command} failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
