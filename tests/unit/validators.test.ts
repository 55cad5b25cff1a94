import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loginSchema, registerSchema } from "@/domains/auth/validators/auth.validator";
import { updateDoctorProfileSchema } from "@/domains/doctors/validators/doctor.validator";
import { createPatientSchema, patientAppointmentsQuerySchema } from "@/domains/patients/validators/patient.validator";
import { createAppointmentSchema, queryAppointmentsSchema } from "@/domains/appointments/validators/appointment.validator";
import { formatZodErrors, idParamSchema } from "@/shared/middleware/validation.middleware";

describe("validators", () => {
  describe("registerSchema", () => {
    it("trims and lower-cases the email and accepts a one-character password", () => {
      const parsed = registerSchema.parse({ name: " Ana ", email: " Ana@Clinic.Test ", password: "p" });

      expect(parsed).toEqual({ name: "Ana", email: "ana@clinic.test", password: "p" });
    });

    it("rejects a malformed email and an empty password", () => {
      const result = registerSchema.safeParse({ name: "Ana", email: "not-an-email", password: "" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodErrors(result.error).map((error) => error.field)).toEqual(["email", "password"]);
      }
    });
  });

  it("loginSchema requires both fields", () => {
    expect(loginSchema.safeParse({ email: "ana@clinic.test" }).success).toBe(false);
  });

  it("updateDoctorProfileSchema needs at least one field", () => {
    expect(updateDoctorProfileSchema.safeParse({}).success).toBe(false);
    expect(updateDoctorProfileSchema.parse({ specialty: null })).toEqual({ specialty: null });
  });

  describe("createPatientSchema", () => {
    it("accepts a name alone", () => {
      expect(createPatientSchema.parse({ name: "Marta" })).toEqual({ name: "Marta" });
    });

    it("enforces the age range and the phone length", () => {
      expect(createPatientSchema.safeParse({ name: "Marta", age: 151 }).success).toBe(false);
      expect(createPatientSchema.safeParse({ name: "Marta", age: 12.5 }).success).toBe(false);
      expect(createPatientSchema.safeParse({ name: "Marta", phone: "1".repeat(21) }).success).toBe(false);
      expect(createPatientSchema.safeParse({ name: "Marta", age: 0, phone: "1".repeat(20) }).success).toBe(true);
    });
  });

  describe("createAppointmentSchema", () => {
    it("checks the shape of date and time only", () => {
      expect(createAppointmentSchema.safeParse({ patientId: 1, date: "2025-02-30", time: "09:00" }).success).toBe(true);
      expect(createAppointmentSchema.safeParse({ patientId: 1, date: "10/01/2025", time: "09:00" }).success).toBe(false);
      expect(createAppointmentSchema.safeParse({ patientId: 1, date: "2025-01-10", time: "9am" }).success).toBe(false);
    });

    it("requires a numeric patient id", () => {
      expect(createAppointmentSchema.safeParse({ patientId: "1", date: "2025-01-10", time: "09:00" }).success).toBe(
        false
      );
    });
  });

  describe("query and param schemas", () => {
    it("coerces query strings", () => {
      expect(queryAppointmentsSchema.parse({ patientId: "2", includeCancelled: "false" })).toEqual({
        patientId: 2,
        includeCancelled: false,
      });
      expect(patientAppointmentsQuerySchema.parse({})).toEqual({});
    });

    it("rejects a non-boolean flag", () => {
      expect(() => queryAppointmentsSchema.parse({ includeCancelled: "yes" })).toThrow(ZodError);
    });

    it("accepts only positive integer ids", () => {
      expect(idParamSchema.parse({ id: "7" })).toEqual({ id: 7 });
      expect(idParamSchema.safeParse({ id: "abc" }).success).toBe(false);
      expect(idParamSchema.safeParse({ id: "0" }).success).toBe(false);
    });
  });
});
