import { z } from "zod";
import { booleanQuerySchema } from "@/shared/middleware/validation.middleware";

export const createPatientSchema = z.object({
  name: z.string().trim().min(1, "Patient name is required").max(255, "Name cannot exceed 255 characters"),
  age: z
    .number()
    .int("Age must be a whole number")
    .min(0, "Age cannot be negative")
    .max(150, "Age cannot exceed 150")
    .nullable()
    .optional(),
  email: z.string().trim().email("Invalid email format").max(255, "Email cannot exceed 255 characters").nullable().optional(),
  phone: z.string().trim().max(20, "Phone cannot exceed 20 characters").nullable().optional(),
  history: z.string().max(5000, "Medical history cannot exceed 5000 characters").nullable().optional(),
});

export const patientAppointmentsQuerySchema = z.object({
  includeCancelled: booleanQuerySchema.optional(),
});

export type CreatePatientInput = z.infer<typeof createPatientSchema>;
