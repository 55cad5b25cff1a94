import { Router, type RequestHandler } from "express";
import { validateBody } from "@/shared/middleware/validation.middleware";
import type { PatientController } from "../controllers/patient.controller";
import { createPatientSchema } from "../validators/patient.validator";

export const createPatientRoutes = (patientController: PatientController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @openapi
   * /patients:
   *   post:
   *     tags: [Patients]
   *     summary: Register a patient for the current doctor
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreatePatientRequest'
   *     responses:
   *       201:
   *         description: Patient registered
   *       400:
   *         description: Validation error
   *   get:
   *     tags: [Patients]
   *     summary: List the current doctor's patients, ordered by id
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Patients with their appointment counts
   */
  router.post("/", validateBody(createPatientSchema), patientController.createPatient);
  router.get("/", patientController.getPatients);

  /**
   * @openapi
   * /patients/{id}:
   *   get:
   *     tags: [Patients]
   *     summary: Full patient record including history
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/IdParam'
   *     responses:
   *       200:
   *         description: Patient
   *       404:
   *         description: Not found or owned by another doctor
   *   delete:
   *     tags: [Patients]
   *     summary: Delete a patient and all of their appointments
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/IdParam'
   *     responses:
   *       200:
   *         description: Patient deleted
   *       404:
   *         description: Not found
   */
  router.get("/:id", patientController.getPatient);
  router.delete("/:id", patientController.deletePatient);

  /**
   * @openapi
   * /patients/{id}/appointments:
   *   get:
   *     tags: [Patients]
   *     summary: A patient's appointments with active and cancelled totals
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/IdParam'
   *       - in: query
   *         name: includeCancelled
   *         schema: { type: string, enum: ["true", "false"] }
   *     responses:
   *       200:
   *         description: Appointments and summary
   */
  router.get("/:id/appointments", patientController.getPatientAppointments);

  return router;
};
