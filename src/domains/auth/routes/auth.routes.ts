import { Router } from "express";
import { authRateLimit } from "@/shared/middleware/rate-limit.middleware";
import { validateBody } from "@/shared/middleware/validation.middleware";
import type { AuthController } from "../controllers/auth.controller";
import { loginSchema, registerSchema } from "../validators/auth.validator";

export const createAuthRoutes = (authController: AuthController): Router => {
  const router = Router();

  /**
   * @openapi
   * /auth/register:
   *   post:
   *     tags: [Authentication]
   *     summary: Register a doctor account
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RegisterDoctorRequest'
   *     responses:
   *       201:
   *         description: Doctor registered
   *       400:
   *         description: Validation error
   *       409:
   *         description: Email already registered
   */
  router.post("/register", authRateLimit, validateBody(registerSchema), authController.register);

  /**
   * @openapi
   * /auth/login:
   *   post:
   *     tags: [Authentication]
   *     summary: Exchange email and password for an access token
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LoginRequest'
   *     responses:
   *       200:
   *         description: Authenticated
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/AuthResponse'
   *       401:
   *         description: Invalid email or password
   */
  router.post("/login", authRateLimit, validateBody(loginSchema), authController.login);

  return router;
};
