import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError, ValidationError } from "@/shared/types/common.types";
import type { IDoctorRepository } from "@/domains/doctors/models/doctor.model";
import type { IPatientRepository, Patient, PatientSummary } from "../models/patient.model";

const moduleLogger = createModuleLogger("PatientService");

export interface CreatePatientRequest {
  doctorId: number;
  name: string;
  age?: number | null | undefined;
  email?: string | null | undefined;
  phone?: string | null | undefined;
  history?: string | null | undefined;
}

export class PatientService {
  constructor(
    private patientRepository: IPatientRepository,
    private doctorRepository: IDoctorRepository
  ) {}

  async registerPatient(request: CreatePatientRequest): Promise<Patient> {
    this.validateCreatePatientRequest(request);

    const doctor = await this.doctorRepository.findById(request.doctorId);
    if (!doctor) {
      throw new NotFoundError("Doctor not found");
    }

    const patient = await this.patientRepository.create({
      doctorId: request.doctorId,
      name: request.name.trim(),
      age: request.age ?? null,
      email: request.email?.trim().toLowerCase() || null,
      phone: request.phone?.trim() || null,
      history: request.history?.trim() || null,
    });

    moduleLogger.info({ patientId: patient.id, doctorId: request.doctorId }, "Patient registered successfully");

    return patient;
  }

  /**
   * Looks a patient up by id. With `doctorId`, a patient owned by someone else
   * is reported as missing.
   */
  async getPatient(patientId: number, doctorId?: number): Promise<Patient> {
    const patient = await this.patientRepository.findById(patientId);

    if (!patient || (doctorId !== undefined && patient.doctorId !== doctorId)) {
      throw new NotFoundError("Patient not found");
    }

    return patient;
  }

  async listPatients(doctorId: number): Promise<PatientSummary[]> {
    return this.patientRepository.findAllByDoctor(doctorId);
  }

  async deletePatient(patientId: number, doctorId: number): Promise<void> {
    const deleted = await this.patientRepository.delete(patientId, doctorId);
    if (!deleted) {
      throw new NotFoundError("Patient not found");
    }

    moduleLogger.info({ patientId, doctorId }, "Patient deleted with all appointments");
  }

  // Private validation methods
  private validateCreatePatientRequest(request: CreatePatientRequest): void {
    if (!request.name || request.name.trim().length === 0) {
      throw new ValidationError("Patient name is required", "name");
    }

    if (request.age !== undefined && request.age !== null) {
      if (!Number.isInteger(request.age) || request.age < 0 || request.age > 150) {
        throw new ValidationError("Age must be a whole number between 0 and 150", "age");
      }
    }

    if (request.phone && request.phone.trim().length > 20) {
      throw new ValidationError("Phone cannot exceed 20 characters", "phone");
    }

    if (request.history && request.history.length > 5000) {
      throw new ValidationError("Medical history cannot exceed 5000 characters", "history");
    }
  }
}
