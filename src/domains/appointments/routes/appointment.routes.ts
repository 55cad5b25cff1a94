import { Router, type RequestHandler } from "express";
import { validateBody } from "@/shared/middleware/validation.middleware";
import type { AppointmentController } from "../controllers/appointment.controller";
import { createAppointmentSchema } from "../validators/appointment.validator";

export const createAppointmentRoutes = (
  appointmentController: AppointmentController,
  authenticate: RequestHandler
): Router => {
  const router = Router();

  // Apply authentication to all routes
  router.use(authenticate);

  /**
   * @openapi
   * /appointments:
   *   post:
   *     tags: [Appointments]
   *     summary: Schedule an appointment for one of the current doctor's patients
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateAppointmentRequest'
   *     responses:
   *       201:
   *         description: Appointment scheduled
   *       404:
   *         description: Patient not found
   *       409:
   *         description: Identical appointment already scheduled
   *   get:
   *     tags: [Appointments]
   *     summary: List appointments ordered by date, time and id
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: patientId
   *         schema: { type: integer }
   *       - in: query
   *         name: from
   *         schema: { type: string, format: date }
   *       - in: query
   *         name: to
   *         schema: { type: string, format: date }
   *       - in: query
   *         name: includeCancelled
   *         schema: { type: string, enum: ["true", "false"] }
   *     responses:
   *       200:
   *         description: Appointments
   */
  router.post("/", validateBody(createAppointmentSchema), appointmentController.createAppointment);
  router.get("/", appointmentController.getAppointments);

  /**
   * @openapi
   * /appointments/{id}:
   *   get:
   *     tags: [Appointments]
   *     summary: Get one appointment
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/IdParam'
   *     responses:
   *       200:
   *         description: Appointment
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Appointment'
   *       404:
   *         description: Not found
   */
  router.get("/:id", appointmentController.getAppointment);

  /**
   * @openapi
   * /appointments/{id}/cancel:
   *   patch:
   *     tags: [Appointments]
   *     summary: Cancel an active appointment; the record is kept
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/IdParam'
   *     responses:
   *       200:
   *         description: Appointment with cancelled set to true
   *       404:
   *         description: Not found or already cancelled
   */
  router.patch("/:id/cancel", appointmentController.cancelAppointment);

  return router;
};
