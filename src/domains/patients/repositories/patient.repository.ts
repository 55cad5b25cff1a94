import { isDatabaseError, type Database } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError } from "@/shared/types/common.types";
import {
  toPatient,
  toPatientSummary,
  type CreatePatientData,
  type IPatientRepository,
  type Patient,
  type PatientRow,
  type PatientSummary,
  type PatientSummaryRow,
} from "../models/patient.model";

const moduleLogger = createModuleLogger("PatientRepository");

export class PatientRepository implements IPatientRepository {
  constructor(private readonly db: Database) {}

  async create(patientData: CreatePatientData): Promise<Patient> {
    try {
      const result = await this.db.execute(
        `INSERT INTO pacientes (medico_id, nombre, edad, email, telefono, historial)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          patientData.doctorId,
          patientData.name,
          patientData.age,
          patientData.email,
          patientData.phone,
          patientData.history,
        ]
      );

      const createdPatient = await this.findById(result.insertId);
      if (!createdPatient) {
        throw new Error("Failed to retrieve created patient");
      }

      moduleLogger.info({ patientId: createdPatient.id, doctorId: patientData.doctorId }, "Patient created");

      return createdPatient;
    } catch (error) {
      // Doctor removed between the existence check and the insert
      if (isDatabaseError(error, "ER_NO_REFERENCED_ROW_2")) {
        throw new NotFoundError("Doctor not found");
      }
      throw error;
    }
  }

  async findById(id: number): Promise<Patient | null> {
    const row = await this.db.queryOne<PatientRow>(
      `SELECT id, medico_id, nombre, edad, email, telefono, historial, fecha_registro
       FROM pacientes
       WHERE id = ?`,
      [id]
    );

    return row ? toPatient(row) : null;
  }

  async findAllByDoctor(doctorId: number): Promise<PatientSummary[]> {
    const rows = await this.db.query<PatientSummaryRow>(
      `SELECT
        p.id, p.medico_id, p.nombre, p.edad, p.email, p.telefono, p.historial, p.fecha_registro,
        COUNT(c.id) AS citas_count
       FROM pacientes p
       LEFT JOIN citas c ON c.paciente_id = p.id
       WHERE p.medico_id = ?
       GROUP BY p.id
       ORDER BY p.id`,
      [doctorId]
    );

    return rows.map(toPatientSummary);
  }

  async delete(id: number, doctorId: number): Promise<boolean> {
    // One statement; citas rows for the patient go through ON DELETE CASCADE
    const result = await this.db.execute("DELETE FROM pacientes WHERE id = ? AND medico_id = ?", [id, doctorId]);

    if (result.affectedRows > 0) {
      moduleLogger.info({ patientId: id, doctorId }, "Patient deleted");
    }

    return result.affectedRows > 0;
  }
}
