import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Application } from "express";
import request from "supertest";
import App from "@/app";
import { InMemoryStore, createInMemoryRepositories } from "../helpers/in-memory-repositories";
import { API, buildTestApp, registerAndLogin } from "../helpers/test-app";

describe("clinic API", () => {
  let app: Application;
  let token: string;

  beforeEach(async () => {
    ({ app } = buildTestApp());
    ({ token } = await registerAndLogin(app));
  });

  const auth = () => ({ Authorization: `Bearer ${token}` });

  it("runs the register, schedule, cancel, delete scenario", async () => {
    const patient = await request(app)
      .post(`${API}/patients`)
      .set(auth())
      .send({ name: "Marta", age: 40, history: "Asthma" });

    expect(patient.status).toBe(201);
    expect(patient.body.data).toMatchObject({ id: 1, doctorId: 1, name: "Marta" });

    const scheduled = await request(app)
      .post(`${API}/appointments`)
      .set(auth())
      .send({ patientId: 1, date: "2025-01-10", time: "09:00" });

    expect(scheduled.status).toBe(201);
    expect(scheduled.body.data).toMatchObject({ id: 1, date: "2025-01-10", time: "09:00:00", cancelled: false });

    const cancelled = await request(app).patch(`${API}/appointments/1/cancel`).set(auth());

    expect(cancelled.status).toBe(200);
    expect(cancelled.body.data.cancelled).toBe(true);

    const listed = await request(app).get(`${API}/appointments`).set(auth());
    expect(listed.body.data).toHaveLength(1);
    expect(listed.body.data[0].cancelled).toBe(true);

    const deleted = await request(app).delete(`${API}/patients/1`).set(auth());
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ success: true, message: "Patient deleted successfully" });

    const gone = await request(app).get(`${API}/appointments/1`).set(auth());
    expect(gone.status).toBe(404);
    expect(gone.body.code).toBe("NOT_FOUND");
  });

  describe("auth", () => {
    it("returns 201 with the public doctor on register", async () => {
      const response = await request(app)
        .post(`${API}/auth/register`)
        .send({ name: "Luis", email: "luis@clinic.test", password: "secret" });

      expect(response.status).toBe(201);
      expect(response.body.data).toMatchObject({ id: 2, name: "Luis", email: "luis@clinic.test", specialty: null });
      expect(response.body.data).not.toHaveProperty("passwordHash");
    });

    it("returns 409 CONFLICT for a taken email", async () => {
      const response = await request(app)
        .post(`${API}/auth/register`)
        .send({ name: "Copy", email: "ANA@clinic.test", password: "p" });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        success: false,
        message: "A doctor with this email is already registered",
        code: "CONFLICT",
      });
    });

    it("returns 400 with field errors for an invalid body", async () => {
      const response = await request(app).post(`${API}/auth/register`).send({ name: "Luis", password: "p" });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe("VALIDATION_ERROR");
      expect(response.body.errors[0].field).toBe("email");
    });

    it("returns 401 for a wrong password", async () => {
      const response = await request(app).post(`${API}/auth/login`).send({ email: "ana@clinic.test", password: "x" });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ success: false, message: "Invalid email or password", code: "AUTH_ERROR" });
    });

    it("returns 401 without a bearer token", async () => {
      const response = await request(app).get(`${API}/patients`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe("Access token required");
    });

    it("rejects a token whose doctor was deleted", async () => {
      await request(app).delete(`${API}/doctors/me`).set(auth()).expect(200);

      const response = await request(app).get(`${API}/doctors/me`).set(auth());

      expect(response.status).toBe(401);
      expect(response.body.message).toBe("Doctor not found");
    });
  });

  describe("doctors", () => {
    it("reads and edits the current profile", async () => {
      const profile = await request(app).get(`${API}/doctors/me`).set(auth());
      expect(profile.body.data).toMatchObject({ id: 1, name: "Dr. Ana", specialty: "Cardiology" });

      const updated = await request(app).patch(`${API}/doctors/me`).set(auth()).send({ specialty: null });
      expect(updated.status).toBe(200);
      expect(updated.body.data.specialty).toBeNull();
    });
  });

  describe("patients", () => {
    it("lists only the current doctor's patients with appointment counts", async () => {
      const other = await registerAndLogin(app, "luis@clinic.test");
      await request(app).post(`${API}/patients`).set(auth()).send({ name: "Marta" });
      await request(app)
        .post(`${API}/patients`)
        .set({ Authorization: `Bearer ${other.token}` })
        .send({ name: "Elena" });
      await request(app).post(`${API}/patients`).set(auth()).send({ name: "Jorge" });
      await request(app)
        .post(`${API}/appointments`)
        .set(auth())
        .send({ patientId: 3, date: "2025-01-10", time: "10:00" });

      const response = await request(app).get(`${API}/patients`).set(auth());

      expect(
        response.body.data.map((patient: { id: number; appointmentCount: number }) => [
          patient.id,
          patient.appointmentCount,
        ])
      ).toEqual([
        [1, 0],
        [3, 1],
      ]);
    });

    it("returns 404 for another doctor's patient", async () => {
      const other = await registerAndLogin(app, "luis@clinic.test");
      await request(app)
        .post(`${API}/patients`)
        .set({ Authorization: `Bearer ${other.token}` })
        .send({ name: "Elena" });

      const response = await request(app).get(`${API}/patients/1`).set(auth());

      expect(response.status).toBe(404);
    });

    it("returns 400 for a non-numeric id", async () => {
      const response = await request(app).get(`${API}/patients/abc`).set(auth());

      expect(response.status).toBe(400);
      expect(response.body.errors[0].field).toBe("id");
    });

    it("returns a patient's appointments with a summary", async () => {
      await request(app).post(`${API}/patients`).set(auth()).send({ name: "Marta" });
      await request(app).post(`${API}/appointments`).set(auth()).send({ patientId: 1, date: "2025-01-10", time: "09:00" });
      await request(app).post(`${API}/appointments`).set(auth()).send({ patientId: 1, date: "2025-01-11", time: "09:00" });
      await request(app).patch(`${API}/appointments/1/cancel`).set(auth());

      const response = await request(app)
        .get(`${API}/patients/1/appointments?includeCancelled=false`)
        .set(auth());

      expect(response.status).toBe(200);
      expect(response.body.data.appointments).toHaveLength(1);
      expect(response.body.data.summary).toEqual({ total: 2, active: 1, cancelled: 1 });
    });
  });

  describe("appointments", () => {
    beforeEach(async () => {
      await request(app).post(`${API}/patients`).set(auth()).send({ name: "Marta" });
    });

    it("returns 404 when scheduling for a missing patient", async () => {
      const response = await request(app)
        .post(`${API}/appointments`)
        .set(auth())
        .send({ patientId: 99, date: "2025-01-10", time: "09:00" });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe("Patient not found");
    });

    it("returns 400 on the date field for an impossible date", async () => {
      const response = await request(app)
        .post(`${API}/appointments`)
        .set(auth())
        .send({ patientId: 1, date: "2025-02-30", time: "09:00" });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual([
        {
          field: "date",
          message: "Date must be a valid calendar date in YYYY-MM-DD format",
          code: "VALIDATION_ERROR",
        },
      ]);
    });

    it("returns 409 for an exact duplicate", async () => {
      const slot = { patientId: 1, date: "2025-01-10", time: "09:00", reason: "Check-up" };
      await request(app).post(`${API}/appointments`).set(auth()).send(slot).expect(201);

      const response = await request(app).post(`${API}/appointments`).set(auth()).send(slot);

      expect(response.status).toBe(409);
      expect(response.body.code).toBe("CONFLICT");
    });

    it("returns 404 when cancelling twice", async () => {
      await request(app).post(`${API}/appointments`).set(auth()).send({ patientId: 1, date: "2025-01-10", time: "09:00" });
      await request(app).patch(`${API}/appointments/1/cancel`).set(auth()).expect(200);

      const response = await request(app).patch(`${API}/appointments/1/cancel`).set(auth());

      expect(response.status).toBe(404);
    });

    it("filters the list by query parameters", async () => {
      await request(app).post(`${API}/appointments`).set(auth()).send({ patientId: 1, date: "2025-01-10", time: "09:00" });
      await request(app).post(`${API}/appointments`).set(auth()).send({ patientId: 1, date: "2025-03-10", time: "09:00" });
      await request(app).patch(`${API}/appointments/1/cancel`).set(auth());

      const response = await request(app)
        .get(`${API}/appointments?from=2025-01-01&to=2025-12-31&includeCancelled=false`)
        .set(auth());

      expect(response.body.data.map((appointment: { id: number }) => appointment.id)).toEqual([2]);
    });

    it("returns 400 for an inverted date range", async () => {
      const response = await request(app).get(`${API}/appointments?from=2025-02-01&to=2025-01-01`).set(auth());

      expect(response.status).toBe(400);
      expect(response.body.errors[0].field).toBe("to");
    });
  });

  describe("operational routes", () => {
    it("reports the database as up", async () => {
      const response = await request(app).get("/health");

      expect(response.status).toBe(200);
      expect(response.body.data.database).toBe("up");
    });

    it("returns 503 when the database ping fails", async () => {
      const { app: downApp } = buildTestApp(async () => {
        throw new Error("connect ECONNREFUSED");
      });

      const response = await request(downApp).get("/health");

      expect(response.status).toBe(503);
      expect(response.body.success).toBe(false);
      expect(response.body.data.database).toBe("down");
    });

    it("returns ROUTE_NOT_FOUND for unknown routes", async () => {
      const response = await request(app).get(`${API}/unknown`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        message: `Route GET ${API}/unknown not found`,
        code: "ROUTE_NOT_FOUND",
      });
    });

    it("returns 400 for malformed JSON", async () => {
      const response = await request(app)
        .post(`${API}/auth/login`)
        .set("Content-Type", "application/json")
        .send('{"email": ');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("Malformed JSON body");
    });

    it("returns 413 VALIDATION_ERROR for a body over the JSON limit", async () => {
      const response = await request(app)
        .post(`${API}/auth/login`)
        .set("Content-Type", "application/json")
        .send(JSON.stringify({ email: "ana@clinic.test", password: "p".repeat(2 * 1024 * 1024) }));

      expect(response.status).toBe(413);
      expect(response.body).toEqual({
        success: false,
        message: "Request body too large",
        code: "VALIDATION_ERROR",
      });
    });

    it("hides the cause of an unexpected error outside development", async () => {
      const repositories = createInMemoryRepositories(new InMemoryStore());
      vi.spyOn(repositories.patients, "findAllByDoctor").mockRejectedValue(
        new Error("connect ECONNREFUSED 127.0.0.1:3306")
      );
      const failingApp = new App({ db: { ping: async () => undefined }, repositories }).getApp();
      const { token: failingToken } = await registerAndLogin(failingApp);

      const response = await request(failingApp)
        .get(`${API}/patients`)
        .set({ Authorization: `Bearer ${failingToken}` });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        success: false,
        message: "Internal server error",
        code: "INTERNAL_ERROR",
      });
    });

    it("echoes the correlation id", async () => {
      const response = await request(app).get("/health").set("X-Correlation-ID", "req-123");

      expect(response.headers["x-correlation-id"]).toBe("req-123");
    });
  });
});
