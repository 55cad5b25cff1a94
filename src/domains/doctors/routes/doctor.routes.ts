import { Router, type RequestHandler } from "express";
import { validateBody } from "@/shared/middleware/validation.middleware";
import type { DoctorController } from "../controllers/doctor.controller";
import { updateDoctorProfileSchema } from "../validators/doctor.validator";

export const createDoctorRoutes = (doctorController: DoctorController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @openapi
   * /doctors/me:
   *   get:
   *     tags: [Doctors]
   *     summary: Current doctor's profile
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Profile
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Doctor'
   *   patch:
   *     tags: [Doctors]
   *     summary: Edit name or specialty
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               name: { type: string }
   *               specialty: { type: string, nullable: true }
   *     responses:
   *       200:
   *         description: Updated profile
   *   delete:
   *     tags: [Doctors]
   *     summary: Delete the account with its patients and appointments
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Account deleted
   */
  router.get("/me", doctorController.getProfile);
  router.patch("/me", validateBody(updateDoctorProfileSchema), doctorController.updateProfile);
  router.delete("/me", doctorController.deleteAccount);

  return router;
};
