import type { Request, Response, NextFunction } from "express";
import { sendCreated, sendSuccess } from "@/shared/utils/response";
import type { AuthService } from "../services/auth.service";
import type { LoginInput, RegisterInput } from "../validators/auth.validator";

export class AuthController {
  constructor(private authService: AuthService) {}

  register = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const registerData: RegisterInput = req.body;

      const doctor = await this.authService.register(registerData);

      sendCreated(res, doctor, "Doctor registered successfully");
    } catch (error) {
      next(error);
    }
  };

  login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const loginData: LoginInput = req.body;

      const result = await this.authService.login(loginData);

      sendSuccess(res, result, "Login successful");
    } catch (error) {
      next(error);
    }
  };
}
