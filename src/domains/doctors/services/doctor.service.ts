import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError } from "@/shared/types/common.types";
import type { IDoctorRepository, PublicDoctor } from "../models/doctor.model";

const moduleLogger = createModuleLogger("DoctorService");

export interface UpdateDoctorProfileRequest {
  name?: string | undefined;
  specialty?: string | null | undefined;
}

export class DoctorService {
  constructor(private doctorRepository: IDoctorRepository) {}

  async getDoctor(doctorId: number): Promise<PublicDoctor> {
    const doctor = await this.doctorRepository.findById(doctorId);
    if (!doctor) {
      throw new NotFoundError("Doctor not found");
    }

    return doctor;
  }

  async updateProfile(doctorId: number, request: UpdateDoctorProfileRequest): Promise<PublicDoctor> {
    const doctor = await this.doctorRepository.update(doctorId, {
      name: request.name?.trim(),
      specialty: request.specialty === undefined ? undefined : request.specialty?.trim() || null,
    });

    if (!doctor) {
      throw new NotFoundError("Doctor not found");
    }

    return doctor;
  }

  /**
   * Removes the doctor together with their patients and every appointment
   * attached to them.
   */
  async deleteDoctor(doctorId: number): Promise<void> {
    const deleted = await this.doctorRepository.delete(doctorId);
    if (!deleted) {
      throw new NotFoundError("Doctor not found");
    }

    moduleLogger.info({ doctorId }, "Doctor account deleted with all patients and appointments");
  }
}
