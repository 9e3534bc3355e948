import type { DosageRecord, MedicalEvent } from "../shared/types.js";
import { LOOKAHEAD_MS } from "./time.js";
import { administeredOnly } from "./time_window.js";

/** An event attributed to exactly one administered dosage. */
export interface CreditedEvent {
  event: MedicalEvent;
  dosage: DosageRecord;
}

/**
 * Administered dosages in chronological order. The sort is stable, so
 * dosages sharing an administration time keep their input order.
 */
export function administeredChronologically(dosages: readonly DosageRecord[]): DosageRecord[] {
  return dosages
    .filter(administeredOnly)
    .sort((a, b) => a.administrationTime.getTime() - b.administrationTime.getTime());
}

/**
 * Index of the nearest dosage at or before `t` in a chronologically sorted
 * list, or -1. On an exact-time collision the earliest such dosage wins.
 */
function nearestPrecedingIndex(sorted: readonly DosageRecord[], t: number): number {
  let lo = 0;
  let hi = sorted.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid].administrationTime.getTime() <= t) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  if (found < 0) return -1;

  const collision = sorted[found].administrationTime.getTime();
  while (found > 0 && sorted[found - 1].administrationTime.getTime() === collision) {
    found--;
  }
  return found;
}

/**
 * Credit each event to the nearest preceding administered dosage, provided
 * the event falls within the 24h lookahead window [t, t + 24h] of that dose.
 *
 * An event is credited at most once (duplicate event ids are ignored), so
 * frequent dosing cannot double count it. Results follow event input order.
 */
export function creditEvents(
  dosages: readonly DosageRecord[],
  events: readonly MedicalEvent[]
): CreditedEvent[] {
  const sorted = administeredChronologically(dosages);
  if (sorted.length === 0) return [];

  const seen = new Set<string>();
  const credited: CreditedEvent[] = [];

  for (const event of events) {
    if (seen.has(event.id)) continue;
    seen.add(event.id);

    const t = event.eventTime.getTime();
    const idx = nearestPrecedingIndex(sorted, t);
    if (idx < 0) continue;

    const dosage = sorted[idx];
    if (t - dosage.administrationTime.getTime() <= LOOKAHEAD_MS) {
      credited.push({ event, dosage });
    }
  }

  return credited;
}
