import { isDatabaseError, type Database, type QueryParam } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError } from "@/shared/types/common.types";
import {
  toDoctorWithCredentials,
  toPublicDoctor,
  type CreateDoctorData,
  type DoctorRow,
  type DoctorWithCredentials,
  type IDoctorRepository,
  type PublicDoctor,
  type UpdateDoctorData,
} from "../models/doctor.model";

const moduleLogger = createModuleLogger("DoctorRepository");

const DOCTOR_COLUMNS = "id, nombre, email, password_hash, especialidad, fecha_registro";

export class DoctorRepository implements IDoctorRepository {
  constructor(private readonly db: Database) {}

  async create(doctorData: CreateDoctorData): Promise<PublicDoctor> {
    try {
      const result = await this.db.execute(
        "INSERT INTO medicos (nombre, email, password_hash, especialidad) VALUES (?, ?, ?, ?)",
        [doctorData.name, doctorData.email, doctorData.passwordHash, doctorData.specialty]
      );

      const createdDoctor = await this.findById(result.insertId);
      if (!createdDoctor) {
        throw new Error("Failed to retrieve created doctor");
      }

      moduleLogger.info({ doctorId: createdDoctor.id }, "Doctor created");

      return createdDoctor;
    } catch (error) {
      // The unique index on email is the final word when two registrations race
      if (isDatabaseError(error, "ER_DUP_ENTRY")) {
        throw new ConflictError("A doctor with this email is already registered");
      }
      throw error;
    }
  }

  async findById(id: number): Promise<PublicDoctor | null> {
    const row = await this.db.queryOne<DoctorRow>(`SELECT ${DOCTOR_COLUMNS} FROM medicos WHERE id = ?`, [id]);
    return row ? toPublicDoctor(row) : null;
  }

  async findByEmailWithCredentials(email: string): Promise<DoctorWithCredentials | null> {
    const row = await this.db.queryOne<DoctorRow>(`SELECT ${DOCTOR_COLUMNS} FROM medicos WHERE email = ?`, [email]);
    return row ? toDoctorWithCredentials(row) : null;
  }

  async update(id: number, updateData: UpdateDoctorData): Promise<PublicDoctor | null> {
    const assignments: string[] = [];
    const params: QueryParam[] = [];

    if (updateData.name !== undefined) {
      assignments.push("nombre = ?");
      params.push(updateData.name);
    }
    if (updateData.specialty !== undefined) {
      assignments.push("especialidad = ?");
      params.push(updateData.specialty);
    }

    if (assignments.length > 0) {
      await this.db.execute(`UPDATE medicos SET ${assignments.join(", ")} WHERE id = ?`, [...params, id]);
      moduleLogger.info({ doctorId: id, changes: Object.keys(updateData) }, "Doctor updated");
    }

    return this.findById(id);
  }

  async delete(id: number): Promise<boolean> {
    // pacientes and citas rows go with it through ON DELETE CASCADE
    const result = await this.db.execute("DELETE FROM medicos WHERE id = ?", [id]);

    if (result.affectedRows > 0) {
      moduleLogger.info({ doctorId: id }, "Doctor deleted");
    }

    return result.affectedRows > 0;
  }
}
