import { createDatabase } from "@/shared/config/database";
import { logger } from "@/shared/config/logger";
import { createContainer, createRepositories, type Container } from "@/container";

export const DEMO_DOCTOR = {
  name: "Demo Doctor",
  email: "demo.doctor@example.com",
  password: "change-me",
  specialty: "General Medicine",
};

export interface SeedResult {
  doctorId: number;
  patientIds: number[];
  appointmentIds: number[];
}

/**
 * Registers the demo doctor with two patients and one appointment. Returns
 * null when the demo doctor already exists.
 */
export const seedDemoData = async ({ repositories, services }: Container): Promise<SeedResult | null> => {
  const existing = await repositories.doctors.findByEmailWithCredentials(DEMO_DOCTOR.email);

  if (existing) {
    logger.info({ doctorId: existing.id }, "Demo doctor already present, skipping seed");
    return null;
  }

  const doctor = await services.auth.register(DEMO_DOCTOR);

  const firstPatient = await services.patients.registerPatient({
    doctorId: doctor.id,
    name: "Ana Torres",
    age: 34,
    email: "ana.torres@example.com",
    phone: "555-0101",
    history: "Seasonal allergies.",
  });

  const secondPatient = await services.patients.registerPatient({
    doctorId: doctor.id,
    name: "Luis Romero",
    age: 58,
    history: "Hypertension, on medication.",
  });

  const appointment = await services.appointments.scheduleAppointment({
    doctorId: doctor.id,
    patientId: firstPatient.id,
    date: "2025-01-10",
    time: "09:00",
    reason: "Annual check-up",
  });

  return {
    doctorId: doctor.id,
    patientIds: [firstPatient.id, secondPatient.id],
    appointmentIds: [appointment.id],
  };
};

async function main(): Promise<void> {
  const db = createDatabase();

  try {
    logger.info("Starting database seeding...");

    const result = await seedDemoData(createContainer(createRepositories(db)));

    if (result) {
      logger.info(result, "Database seeding completed successfully");
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, "Seeding failed");
    process.exit(1);
  });
}
