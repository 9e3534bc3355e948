import {
  pgTable,
  text,
  timestamp,
  boolean,
  uuid,
  varchar,
  numeric,
} from "drizzle-orm/pg-core";

// ── Medications ────────────────────────────────────────────────────
export const medications = pgTable("medications", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: text("name").notNull(),
  genericName: text("generic_name"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// ── Patient Medications ────────────────────────────────────────────
export const patientMedications = pgTable("patient_medications", {
  id: uuid("id").primaryKey().defaultRandom(),
  patientId: uuid("patient_id").notNull(),
  medicationId: uuid("medication_id").notNull().references(() => medications.id),
  startDate: timestamp("start_date"),
  endDate: timestamp("end_date"),
  active: boolean("active").notNull().default(true),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// ── Medication Dosages ─────────────────────────────────────────────
export const medicationDosages = pgTable("medication_dosages", {
  id: uuid("id").primaryKey().defaultRandom(),
  patientId: uuid("patient_id").notNull(),
  medicationId: uuid("medication_id").notNull().references(() => medications.id),
  administrationTime: timestamp("administration_time", { withTimezone: true }).notNull(),
  dosageAmount: numeric("dosage_amount", { precision: 10, scale: 3 }).notNull(),
  dosageUnit: varchar("dosage_unit", { length: 20 }).notNull(),
  schedule: varchar("schedule", { length: 20 }).notNull(),
  administered: boolean("administered").notNull().default(false),
  notes: text("notes"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// ── Medical Events ─────────────────────────────────────────────────
export const medicalEvents = pgTable("medical_events", {
  id: uuid("id").primaryKey().defaultRandom(),
  patientId: uuid("patient_id").notNull(),
  medicationId: uuid("medication_id").references(() => medications.id),
  eventTime: timestamp("event_time", { withTimezone: true }).notNull(),
  title: text("title").notNull(),
  description: text("description"),
  severity: varchar("severity", { length: 10 }).notNull(),
  category: varchar("category", { length: 20 }).notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});
