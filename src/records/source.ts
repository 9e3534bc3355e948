import { v4 as uuidv4 } from "uuid";
import type { DosageRecord, MedicalEvent, MedicationRef } from "../shared/types.js";
import { selectDosages, selectEvents } from "../analytics/time_window.js";

export interface RecordQuery {
  medicationId?: string;
  start?: Date;
  end?: Date;
}

/**
 * Read side of the persistence layer. Supplies raw records for one patient;
 * never writes and never computes analytics.
 */
export interface RecordSource {
  fetchDosages(patientId: string, query?: RecordQuery): Promise<DosageRecord[]>;
  fetchEvents(patientId: string, query?: RecordQuery): Promise<MedicalEvent[]>;
  findMedication(patientId: string, medicationId: string): Promise<MedicationRef | null>;
  /** Distinct medication ids with at least one dosage, in first-recorded order. */
  listMedicationIds(patientId: string): Promise<string[]>;
}

export type NewDosage = Omit<DosageRecord, "id"> & { id?: string };
export type NewEvent = Omit<MedicalEvent, "id"> & { id?: string };

interface PatientMedication extends MedicationRef {
  patientId: string;
}

/**
 * RecordSource over plain arrays. Used by tests and the CLI.
 */
export class InMemoryRecordSource implements RecordSource {
  private dosages: DosageRecord[] = [];
  private events: MedicalEvent[] = [];
  private medications: PatientMedication[] = [];

  addDosage(dosage: NewDosage): DosageRecord {
    const record: DosageRecord = { ...dosage, id: dosage.id ?? uuidv4() };
    this.dosages.push(record);
    return record;
  }

  addEvent(event: NewEvent): MedicalEvent {
    const record: MedicalEvent = { ...event, id: event.id ?? uuidv4() };
    this.events.push(record);
    return record;
  }

  addMedication(patientId: string, medication: MedicationRef): void {
    this.medications.push({ ...medication, patientId });
  }

  async fetchDosages(patientId: string, query: RecordQuery = {}): Promise<DosageRecord[]> {
    const own = this.dosages.filter(
      (d) =>
        d.patientId === patientId &&
        (query.medicationId === undefined || d.medicationId === query.medicationId)
    );
    return selectDosages(own, query.start, query.end).sort(
      (a, b) => a.administrationTime.getTime() - b.administrationTime.getTime()
    );
  }

  async fetchEvents(patientId: string, query: RecordQuery = {}): Promise<MedicalEvent[]> {
    const own = this.events.filter(
      (e) =>
        e.patientId === patientId &&
        (query.medicationId === undefined || e.medicationId === query.medicationId)
    );
    return selectEvents(own, query.start, query.end).sort(
      (a, b) => a.eventTime.getTime() - b.eventTime.getTime()
    );
  }

  async findMedication(patientId: string, medicationId: string): Promise<MedicationRef | null> {
    const found = this.medications.find(
      (m) => m.patientId === patientId && m.id === medicationId
    );
    if (!found) return null;
    return { id: found.id, name: found.name, startDate: found.startDate };
  }

  async listMedicationIds(patientId: string): Promise<string[]> {
    const dosages = await this.fetchDosages(patientId);
    return [...new Set(dosages.map((d) => d.medicationId))];
  }
}
