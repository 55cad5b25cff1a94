import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createModuleLogger } from "@/shared/config/logger";
import { AuthError } from "@/shared/types/common.types";
import type { AuthService } from "@/domains/auth/services/auth.service";
import type { IDoctorRepository, PublicDoctor } from "@/domains/doctors/models/doctor.model";

const moduleLogger = createModuleLogger("AuthMiddleware");

const extractBearerToken = (header: string | undefined): string | null => {
  if (!header) return null;

  const [scheme, token] = header.split(" ");
  if (scheme !== "Bearer" || !token) return null;

  return token;
};

/**
 * Verifies the bearer token and reloads its doctor on every request, so a
 * token outliving its account is rejected.
 */
export const createAuthenticate = (
  authService: Pick<AuthService, "verifyAccessToken">,
  doctorRepository: Pick<IDoctorRepository, "findById">
): RequestHandler => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = extractBearerToken(req.headers.authorization);

      if (!token) {
        throw new AuthError("Access token required");
      }

      const doctorId = authService.verifyAccessToken(token);
      const doctor = await doctorRepository.findById(doctorId);

      if (!doctor) {
        throw new AuthError("Doctor not found");
      }

      req.doctor = doctor;

      moduleLogger.debug({ doctorId: doctor.id, correlationId: req.correlationId }, "Doctor authenticated");

      next();
    } catch (error) {
      next(error);
    }
  };
};

// Handlers behind `authenticate` read the doctor through this
export const getAuthDoctor = (req: Request): PublicDoctor => {
  if (!req.doctor) {
    throw new AuthError("Authentication required");
  }

  return req.doctor;
};
