import type { Request, Response, NextFunction } from "express";
import { getAuthDoctor } from "@/shared/middleware/auth.middleware";
import { idParamSchema } from "@/shared/middleware/validation.middleware";
import { sendCreated, sendDeleted, sendSuccess } from "@/shared/utils/response";
import type { AppointmentService } from "@/domains/appointments/services/appointment.service";
import type { PatientService } from "../services/patient.service";
import { patientAppointmentsQuerySchema, type CreatePatientInput } from "../validators/patient.validator";

export class PatientController {
  constructor(
    private patientService: PatientService,
    private appointmentService: AppointmentService
  ) {}

  createPatient = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const patientData: CreatePatientInput = req.body;

      const patient = await this.patientService.registerPatient({
        ...patientData,
        doctorId: getAuthDoctor(req).id,
      });

      sendCreated(res, patient, "Patient registered successfully");
    } catch (error) {
      next(error);
    }
  };

  getPatients = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const patients = await this.patientService.listPatients(getAuthDoctor(req).id);

      sendSuccess(res, patients, "Patients retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getPatient = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = idParamSchema.parse(req.params);

      const patient = await this.patientService.getPatient(id, getAuthDoctor(req).id);

      sendSuccess(res, patient, "Patient retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  deletePatient = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = idParamSchema.parse(req.params);

      await this.patientService.deletePatient(id, getAuthDoctor(req).id);

      sendDeleted(res, "Patient deleted successfully");
    } catch (error) {
      next(error);
    }
  };

  getPatientAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { includeCancelled } = patientAppointmentsQuerySchema.parse(req.query);

      const result = await this.appointmentService.listPatientAppointments(
        id,
        getAuthDoctor(req).id,
        includeCancelled ?? true
      );

      sendSuccess(res, result, "Patient appointments retrieved successfully");
    } catch (error) {
      next(error);
    }
  };
}
