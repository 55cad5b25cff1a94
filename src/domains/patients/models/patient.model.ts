import type { RowDataPacket } from "mysql2/promise";

// Row shape of the `pacientes` table
export interface PatientRow extends RowDataPacket {
  id: number;
  medico_id: number | null;
  nombre: string;
  edad: number | null;
  email: string | null;
  telefono: string | null;
  historial: string | null;
  fecha_registro: Date;
}

export interface PatientSummaryRow extends PatientRow {
  citas_count: number;
}

export interface Patient {
  id: number;
  doctorId: number | null;
  name: string;
  age: number | null;
  email: string | null;
  phone: string | null;
  history: string | null;
  registeredAt: Date;
}

export interface PatientSummary extends Patient {
  appointmentCount: number;
}

export interface CreatePatientData {
  doctorId: number;
  name: string;
  age: number | null;
  email: string | null;
  phone: string | null;
  history: string | null;
}

export interface IPatientRepository {
  create(data: CreatePatientData): Promise<Patient>;
  findById(id: number): Promise<Patient | null>;
  findAllByDoctor(doctorId: number): Promise<PatientSummary[]>;
  delete(id: number, doctorId: number): Promise<boolean>;
}

export const toPatient = (row: PatientRow): Patient => ({
  id: row.id,
  doctorId: row.medico_id,
  name: row.nombre,
  age: row.edad,
  email: row.email,
  phone: row.telefono,
  history: row.historial,
  registeredAt: row.fecha_registro,
});

export const toPatientSummary = (row: PatientSummaryRow): PatientSummary => ({
  ...toPatient(row),
  appointmentCount: Number(row.citas_count),
});
