import { beforeEach, describe, expect, it } from "vitest";
import { DoctorService } from "@/domains/doctors/services/doctor.service";
import { NotFoundError } from "@/shared/types/common.types";
import { InMemoryDoctorRepository, InMemoryStore } from "../../helpers/in-memory-repositories";

describe("DoctorService", () => {
  let doctorService: DoctorService;

  beforeEach(async () => {
    const doctors = new InMemoryDoctorRepository(new InMemoryStore());
    doctorService = new DoctorService(doctors);

    await doctors.create({ name: "Ana", email: "ana@clinic.test", passwordHash: "hash", specialty: "Cardiology" });
  });

  it("returns the public profile", async () => {
    const doctor = await doctorService.getDoctor(1);

    expect(doctor).toMatchObject({ id: 1, name: "Ana", email: "ana@clinic.test", specialty: "Cardiology" });
    expect(doctor).not.toHaveProperty("passwordHash");
  });

  it("fails with NotFoundError for an unknown id", async () => {
    await expect(doctorService.getDoctor(2)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("updates only the fields given", async () => {
    const renamed = await doctorService.updateProfile(1, { name: " Ana María " });

    expect(renamed).toMatchObject({ name: "Ana María", specialty: "Cardiology" });
  });

  it("clears the specialty with null or blank text", async () => {
    await expect(doctorService.updateProfile(1, { specialty: null })).resolves.toMatchObject({ specialty: null });
    await doctorService.updateProfile(1, { specialty: "Neurology" });
    await expect(doctorService.updateProfile(1, { specialty: "  " })).resolves.toMatchObject({ specialty: null });
  });

  it("deletes the account once", async () => {
    await doctorService.deleteDoctor(1);

    await expect(doctorService.getDoctor(1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(doctorService.deleteDoctor(1)).rejects.toBeInstanceOf(NotFoundError);
  });
});
