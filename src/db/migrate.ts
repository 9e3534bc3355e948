import "dotenv/config";
import { pool, db } from "./connection.js";
import { sql } from "drizzle-orm";

async function migrate() {
  console.log("Running migrations...");

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS medications (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      name TEXT NOT NULL,
      generic_name TEXT,
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS patient_medications (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      patient_id UUID NOT NULL,
      medication_id UUID NOT NULL REFERENCES medications(id),
      start_date TIMESTAMP,
      end_date TIMESTAMP,
      active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS medication_dosages (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      patient_id UUID NOT NULL,
      medication_id UUID NOT NULL REFERENCES medications(id),
      administration_time TIMESTAMPTZ NOT NULL,
      dosage_amount NUMERIC(10, 3) NOT NULL,
      dosage_unit VARCHAR(20) NOT NULL,
      schedule VARCHAR(20) NOT NULL,
      administered BOOLEAN NOT NULL DEFAULT FALSE,
      notes TEXT,
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS medical_events (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      patient_id UUID NOT NULL,
      medication_id UUID REFERENCES medications(id),
      event_time TIMESTAMPTZ NOT NULL,
      title TEXT NOT NULL,
      description TEXT,
      severity VARCHAR(10) NOT NULL,
      category VARCHAR(20) NOT NULL,
      created_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);

  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS medication_dosages_patient_time_idx
      ON medication_dosages (patient_id, administration_time)
  `);

  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS medical_events_patient_time_idx
      ON medical_events (patient_id, event_time)
  `);

  console.log("Migrations complete.");
  await pool.end();
}

migrate().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
