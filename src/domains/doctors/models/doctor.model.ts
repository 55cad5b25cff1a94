import type { RowDataPacket } from "mysql2/promise";

// Row shape of the `medicos` table
export interface DoctorRow extends RowDataPacket {
  id: number;
  nombre: string;
  email: string;
  password_hash: string;
  especialidad: string | null;
  fecha_registro: Date;
}

export interface PublicDoctor {
  id: number;
  name: string;
  email: string;
  specialty: string | null;
  registeredAt: Date;
}

// Only the auth service ever sees this shape
export interface DoctorWithCredentials extends PublicDoctor {
  passwordHash: string;
}

export interface CreateDoctorData {
  name: string;
  email: string;
  passwordHash: string;
  specialty: string | null;
}

export interface UpdateDoctorData {
  name?: string | undefined;
  specialty?: string | null | undefined;
}

export interface IDoctorRepository {
  create(data: CreateDoctorData): Promise<PublicDoctor>;
  findById(id: number): Promise<PublicDoctor | null>;
  findByEmailWithCredentials(email: string): Promise<DoctorWithCredentials | null>;
  update(id: number, data: UpdateDoctorData): Promise<PublicDoctor | null>;
  delete(id: number): Promise<boolean>;
}

export const toPublicDoctor = (row: DoctorRow): PublicDoctor => ({
  id: row.id,
  name: row.nombre,
  email: row.email,
  specialty: row.especialidad,
  registeredAt: row.fecha_registro,
});

export const toDoctorWithCredentials = (row: DoctorRow): DoctorWithCredentials => ({
  ...toPublicDoctor(row),
  passwordHash: row.password_hash,
});

export const withoutCredentials = ({ passwordHash: _passwordHash, ...doctor }: DoctorWithCredentials): PublicDoctor => {
  return doctor;
};
