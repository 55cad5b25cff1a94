import type { Request, Response, NextFunction } from "express";
import { getAuthDoctor } from "@/shared/middleware/auth.middleware";
import { idParamSchema } from "@/shared/middleware/validation.middleware";
import { sendCreated, sendSuccess } from "@/shared/utils/response";
import type { AppointmentService } from "../services/appointment.service";
import { queryAppointmentsSchema, type CreateAppointmentInput } from "../validators/appointment.validator";

export class AppointmentController {
  constructor(private appointmentService: AppointmentService) {}

  createAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const appointmentData: CreateAppointmentInput = req.body;

      const appointment = await this.appointmentService.scheduleAppointment({
        ...appointmentData,
        doctorId: getAuthDoctor(req).id,
      });

      sendCreated(res, appointment, "Appointment scheduled successfully");
    } catch (error) {
      next(error);
    }
  };

  getAppointments = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filters = queryAppointmentsSchema.parse(req.query);

      const appointments = await this.appointmentService.listAppointments({
        ...filters,
        doctorId: getAuthDoctor(req).id,
      });

      sendSuccess(res, appointments, "Appointments retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  getAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = idParamSchema.parse(req.params);

      const appointment = await this.appointmentService.getAppointment(id, getAuthDoctor(req).id);

      sendSuccess(res, appointment, "Appointment retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  cancelAppointment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = idParamSchema.parse(req.params);

      const appointment = await this.appointmentService.cancelAppointment(id, getAuthDoctor(req).id);

      sendSuccess(res, appointment, "Appointment cancelled successfully");
    } catch (error) {
      next(error);
    }
  };
}
