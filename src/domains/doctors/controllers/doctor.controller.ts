import type { Request, Response, NextFunction } from "express";
import { getAuthDoctor } from "@/shared/middleware/auth.middleware";
import { sendDeleted, sendSuccess } from "@/shared/utils/response";
import type { DoctorService } from "../services/doctor.service";
import type { UpdateDoctorProfileInput } from "../validators/doctor.validator";

export class DoctorController {
  constructor(private doctorService: DoctorService) {}

  getProfile = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const doctor = await this.doctorService.getDoctor(getAuthDoctor(req).id);

      sendSuccess(res, doctor, "Doctor profile retrieved successfully");
    } catch (error) {
      next(error);
    }
  };

  updateProfile = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const updateData: UpdateDoctorProfileInput = req.body;

      const doctor = await this.doctorService.updateProfile(getAuthDoctor(req).id, updateData);

      sendSuccess(res, doctor, "Doctor profile updated successfully");
    } catch (error) {
      next(error);
    }
  };

  deleteAccount = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await this.doctorService.deleteDoctor(getAuthDoctor(req).id);

      sendDeleted(res, "Doctor account deleted successfully");
    } catch (error) {
      next(error);
    }
  };
}
