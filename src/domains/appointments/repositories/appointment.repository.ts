import type { RowDataPacket } from "mysql2/promise";
import { isDatabaseError, type Database, type QueryParam } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import {
  toAppointment,
  type Appointment,
  type AppointmentFilters,
  type AppointmentRow,
  type CreateAppointmentData,
  type IAppointmentRepository,
} from "../models/appointment.model";

const moduleLogger = createModuleLogger("AppointmentRepository");

const APPOINTMENT_COLUMNS = "id, paciente_id, medico_id, fecha, hora, motivo, cancelada";

export class AppointmentRepository implements IAppointmentRepository {
  constructor(private readonly db: Database) {}

  async create(appointmentData: CreateAppointmentData): Promise<Appointment> {
    let appointmentId: number;

    try {
      appointmentId = await this.db.transaction(async (tx) => {
        // Row lock on the patient serialises schedules for the same patient
        const patient = await tx.queryOne<RowDataPacket>(
          "SELECT id FROM pacientes WHERE id = ? AND medico_id = ? FOR UPDATE",
          [appointmentData.patientId, appointmentData.doctorId]
        );

        if (!patient) {
          throw new NotFoundError("Patient not found");
        }

        const duplicate = await tx.queryOne<AppointmentRow>(
          `SELECT ${APPOINTMENT_COLUMNS} FROM citas
           WHERE medico_id = ? AND paciente_id = ? AND fecha = ? AND hora = ?
             AND motivo <=> ? AND cancelada = FALSE`,
          [
            appointmentData.doctorId,
            appointmentData.patientId,
            appointmentData.date,
            appointmentData.time,
            appointmentData.reason,
          ]
        );

        if (duplicate) {
          throw new ConflictError("An identical appointment is already scheduled");
        }

        const result = await tx.execute(
          `INSERT INTO citas (paciente_id, medico_id, fecha, hora, motivo)
           VALUES (?, ?, ?, ?, ?)`,
          [
            appointmentData.patientId,
            appointmentData.doctorId,
            appointmentData.date,
            appointmentData.time,
            appointmentData.reason,
          ]
        );

        return result.insertId;
      });
    } catch (error) {
      // Doctor or patient removed before the insert reached the foreign keys
      if (isDatabaseError(error, "ER_NO_REFERENCED_ROW_2")) {
        throw new NotFoundError("Patient not found");
      }
      throw error;
    }

    const createdAppointment = await this.findById(appointmentId);
    if (!createdAppointment) {
      throw new Error("Failed to retrieve created appointment");
    }

    moduleLogger.info(
      {
        appointmentId,
        patientId: appointmentData.patientId,
        doctorId: appointmentData.doctorId,
      },
      "Appointment scheduled"
    );

    return createdAppointment;
  }

  async findById(id: number): Promise<Appointment | null> {
    const row = await this.db.queryOne<AppointmentRow>(`SELECT ${APPOINTMENT_COLUMNS} FROM citas WHERE id = ?`, [id]);
    return row ? toAppointment(row) : null;
  }

  async findAll(filters: AppointmentFilters): Promise<Appointment[]> {
    let query = `SELECT ${APPOINTMENT_COLUMNS} FROM citas WHERE medico_id = ?`;
    const params: QueryParam[] = [filters.doctorId];

    if (filters.patientId !== undefined) {
      query += " AND paciente_id = ?";
      params.push(filters.patientId);
    }

    if (filters.from) {
      query += " AND fecha >= ?";
      params.push(filters.from);
    }

    if (filters.to) {
      query += " AND fecha <= ?";
      params.push(filters.to);
    }

    if (!filters.includeCancelled) {
      query += " AND cancelada = FALSE";
    }

    query += " ORDER BY fecha, hora, id";

    const rows = await this.db.query<AppointmentRow>(query, params);
    return rows.map(toAppointment);
  }

  async cancel(id: number, doctorId: number): Promise<boolean> {
    // Single guarded UPDATE: a second cancel finds no active row to change
    const result = await this.db.execute(
      "UPDATE citas SET cancelada = TRUE WHERE id = ? AND medico_id = ? AND cancelada = FALSE",
      [id, doctorId]
    );

    if (result.affectedRows > 0) {
      moduleLogger.info({ appointmentId: id, doctorId }, "Appointment cancelled");
    }

    return result.affectedRows > 0;
  }
}
