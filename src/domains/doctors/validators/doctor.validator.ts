import { z } from "zod";

export const updateDoctorProfileSchema = z
  .object({
    name: z.string().trim().min(1, "Name cannot be empty").max(255, "Name cannot exceed 255 characters").optional(),
    specialty: z.string().trim().max(255, "Specialty cannot exceed 255 characters").nullable().optional(),
  })
  .refine((data) => data.name !== undefined || data.specialty !== undefined, {
    message: "At least one of name or specialty must be provided",
    path: ["name"],
  });

export type UpdateDoctorProfileInput = z.infer<typeof updateDoctorProfileSchema>;
