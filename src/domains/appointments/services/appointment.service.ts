import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError, ValidationError } from "@/shared/types/common.types";
import { isDateBefore, isValidCalendarDate, isValidTimeOfDay, normalizeTime } from "@/shared/utils/date";
import type { IDoctorRepository } from "@/domains/doctors/models/doctor.model";
import type { IPatientRepository } from "@/domains/patients/models/patient.model";
import {
  summarizeAppointments,
  type Appointment,
  type AppointmentSummary,
  type IAppointmentRepository,
} from "../models/appointment.model";

const moduleLogger = createModuleLogger("AppointmentService");

export interface ScheduleAppointmentRequest {
  patientId: number;
  doctorId: number;
  date: string;
  time: string;
  reason?: string | null | undefined;
}

export interface ListAppointmentsRequest {
  doctorId: number;
  patientId?: number | undefined;
  from?: string | undefined;
  to?: string | undefined;
  includeCancelled?: boolean | undefined;
}

export interface PatientAppointments {
  appointments: Appointment[];
  summary: AppointmentSummary;
}

export class AppointmentService {
  constructor(
    private appointmentRepository: IAppointmentRepository,
    private patientRepository: IPatientRepository,
    private doctorRepository: IDoctorRepository
  ) {}

  async scheduleAppointment(request: ScheduleAppointmentRequest): Promise<Appointment> {
    const doctor = await this.doctorRepository.findById(request.doctorId);
    if (!doctor) {
      throw new NotFoundError("Doctor not found");
    }

    // A patient of another doctor is reported as missing, same as on every other patient route
    const patient = await this.patientRepository.findById(request.patientId);
    if (!patient || patient.doctorId !== request.doctorId) {
      throw new NotFoundError("Patient not found");
    }

    this.validateSlot(request.date, request.time);

    const appointment = await this.appointmentRepository.create({
      patientId: request.patientId,
      doctorId: request.doctorId,
      date: request.date,
      time: normalizeTime(request.time),
      reason: request.reason?.trim() || null,
    });

    moduleLogger.info(
      {
        appointmentId: appointment.id,
        patientId: appointment.patientId,
        doctorId: appointment.doctorId,
        date: appointment.date,
      },
      "Appointment scheduled successfully"
    );

    return appointment;
  }

  async getAppointment(appointmentId: number, doctorId: number): Promise<Appointment> {
    const appointment = await this.appointmentRepository.findById(appointmentId);

    if (!appointment || appointment.doctorId !== doctorId) {
      throw new NotFoundError("Appointment not found");
    }

    return appointment;
  }

  /**
   * Soft delete: the row stays and is returned by later reads with
   * `cancelled: true`. Cancelling twice is a NotFoundError.
   */
  async cancelAppointment(appointmentId: number, doctorId: number): Promise<Appointment> {
    const cancelled = await this.appointmentRepository.cancel(appointmentId, doctorId);
    if (!cancelled) {
      throw new NotFoundError("Appointment not found or already cancelled");
    }

    moduleLogger.info({ appointmentId, doctorId }, "Appointment cancelled successfully");

    return this.getAppointment(appointmentId, doctorId);
  }

  async listAppointments(request: ListAppointmentsRequest): Promise<Appointment[]> {
    if (request.from && !isValidCalendarDate(request.from)) {
      throw new ValidationError("from must be a valid date in YYYY-MM-DD format", "from");
    }
    if (request.to && !isValidCalendarDate(request.to)) {
      throw new ValidationError("to must be a valid date in YYYY-MM-DD format", "to");
    }
    if (request.from && request.to && isDateBefore(request.to, request.from)) {
      throw new ValidationError("to cannot be before from", "to");
    }

    return this.appointmentRepository.findAll({
      doctorId: request.doctorId,
      patientId: request.patientId,
      from: request.from,
      to: request.to,
      includeCancelled: request.includeCancelled ?? true,
    });
  }

  async listPatientAppointments(
    patientId: number,
    doctorId: number,
    includeCancelled: boolean = true
  ): Promise<PatientAppointments> {
    const patient = await this.patientRepository.findById(patientId);
    if (!patient || patient.doctorId !== doctorId) {
      throw new NotFoundError("Patient not found");
    }

    const appointments = await this.appointmentRepository.findAll({ doctorId, patientId, includeCancelled: true });

    return {
      appointments: includeCancelled ? appointments : appointments.filter((appointment) => !appointment.cancelled),
      summary: summarizeAppointments(appointments),
    };
  }

  private validateSlot(date: string, time: string): void {
    if (!isValidCalendarDate(date)) {
      throw new ValidationError("Date must be a valid calendar date in YYYY-MM-DD format", "date");
    }

    if (!isValidTimeOfDay(time)) {
      throw new ValidationError("Time must be a valid time of day in HH:MM or HH:MM:SS format", "time");
    }
  }
}
