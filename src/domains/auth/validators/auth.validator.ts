import { z } from "zod";

// Email validation schema
const emailSchema = z
  .string()
  .trim()
  .min(1, "Email is required")
  .email("Invalid email format")
  .max(255, "Email cannot exceed 255 characters")
  .transform((email) => email.toLowerCase());

const nameSchema = z
  .string()
  .trim()
  .min(1, "Name is required")
  .max(255, "Name cannot exceed 255 characters");

export const registerSchema = z.object({
  name: nameSchema,
  email: emailSchema,
  password: z.string().min(1, "Password is required").max(128, "Password cannot exceed 128 characters"),
  specialty: z.string().trim().max(255, "Specialty cannot exceed 255 characters").optional(),
});

export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, "Password is required"),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
