import { Router } from "express";
import type { Container } from "@/container";
import { createAuthenticate } from "@/shared/middleware/auth.middleware";
import { generalRateLimit } from "@/shared/middleware/rate-limit.middleware";
import { AuthController, createAuthRoutes } from "@/domains/auth";
import { DoctorController, createDoctorRoutes } from "@/domains/doctors";
import { PatientController, createPatientRoutes } from "@/domains/patients";
import { AppointmentController, createAppointmentRoutes } from "@/domains/appointments";

export const createApiRouter = ({ repositories, services }: Container): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.auth, repositories.doctors);

  router.use(generalRateLimit);

  // Mount domain routes
  router.use("/auth", createAuthRoutes(new AuthController(services.auth)));
  router.use("/doctors", createDoctorRoutes(new DoctorController(services.doctors), authenticate));
  router.use(
    "/patients",
    createPatientRoutes(new PatientController(services.patients, services.appointments), authenticate)
  );
  router.use("/appointments", createAppointmentRoutes(new AppointmentController(services.appointments), authenticate));

  return router;
};
