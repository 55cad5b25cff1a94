import type { RowDataPacket } from "mysql2/promise";
import { AppointmentStatus } from "@/shared/types/common.types";

// Row shape of the `citas` table; `fecha` arrives as a string, `cancelada` as TINYINT(1)
export interface AppointmentRow extends RowDataPacket {
  id: number;
  paciente_id: number;
  medico_id: number;
  fecha: string;
  hora: string;
  motivo: string | null;
  cancelada: number | boolean | null;
}

export interface Appointment {
  id: number;
  patientId: number;
  doctorId: number;
  date: string;
  time: string;
  reason: string | null;
  cancelled: boolean;
  status: AppointmentStatus;
}

export interface CreateAppointmentData {
  patientId: number;
  doctorId: number;
  date: string;
  time: string;
  reason: string | null;
}

export interface AppointmentFilters {
  doctorId: number;
  patientId?: number | undefined;
  from?: string | undefined;
  to?: string | undefined;
  includeCancelled: boolean;
}

export interface AppointmentSummary {
  total: number;
  active: number;
  cancelled: number;
}

export interface IAppointmentRepository {
  /** Rejects with ConflictError when an identical active appointment exists. */
  create(data: CreateAppointmentData): Promise<Appointment>;
  findById(id: number): Promise<Appointment | null>;
  findAll(filters: AppointmentFilters): Promise<Appointment[]>;
  /** Flips the flag on an active appointment; false when nothing was updated. */
  cancel(id: number, doctorId: number): Promise<boolean>;
}

export const toAppointment = (row: AppointmentRow): Appointment => {
  const cancelled = Boolean(row.cancelada);

  return {
    id: row.id,
    patientId: row.paciente_id,
    doctorId: row.medico_id,
    date: row.fecha,
    time: row.hora,
    reason: row.motivo,
    cancelled,
    status: cancelled ? AppointmentStatus.CANCELLED : AppointmentStatus.SCHEDULED,
  };
};

export const summarizeAppointments = (appointments: Appointment[]): AppointmentSummary => {
  const cancelled = appointments.filter((appointment) => appointment.cancelled).length;

  return {
    total: appointments.length,
    active: appointments.length - cancelled,
    cancelled,
  };
};
