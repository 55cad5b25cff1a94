import { z } from "zod";
import { booleanQuerySchema } from "@/shared/middleware/validation.middleware";

// Shape checks only; calendar validity is decided by the service after ownership
const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");

const timeSchema = z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, "Time must be in HH:MM or HH:MM:SS format");

export const createAppointmentSchema = z.object({
  patientId: z.number().int("Patient id must be an integer").positive("Patient id must be a positive integer"),
  date: dateSchema,
  time: timeSchema,
  reason: z.string().max(2000, "Reason cannot exceed 2000 characters").nullable().optional(),
});

export const queryAppointmentsSchema = z.object({
  patientId: z.coerce.number().int("Patient id must be an integer").positive("Patient id must be a positive integer").optional(),
  from: dateSchema.optional(),
  to: dateSchema.optional(),
  includeCancelled: booleanQuerySchema.optional(),
});

export type CreateAppointmentInput = z.infer<typeof createAppointmentSchema>;
