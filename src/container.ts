import type { Database } from "@/shared/config/database";
import { AuthService } from "@/domains/auth/services/auth.service";
import { DoctorRepository } from "@/domains/doctors/repositories/doctor.repository";
import { DoctorService } from "@/domains/doctors/services/doctor.service";
import type { IDoctorRepository } from "@/domains/doctors/models/doctor.model";
import { PatientRepository } from "@/domains/patients/repositories/patient.repository";
import { PatientService } from "@/domains/patients/services/patient.service";
import type { IPatientRepository } from "@/domains/patients/models/patient.model";
import { AppointmentRepository } from "@/domains/appointments/repositories/appointment.repository";
import { AppointmentService } from "@/domains/appointments/services/appointment.service";
import type { IAppointmentRepository } from "@/domains/appointments/models/appointment.model";

export interface Repositories {
  doctors: IDoctorRepository;
  patients: IPatientRepository;
  appointments: IAppointmentRepository;
}

export interface Services {
  auth: AuthService;
  doctors: DoctorService;
  patients: PatientService;
  appointments: AppointmentService;
}

export interface Container {
  repositories: Repositories;
  services: Services;
}

// Every repository shares the one pool handle
export const createRepositories = (db: Database): Repositories => ({
  doctors: new DoctorRepository(db),
  patients: new PatientRepository(db),
  appointments: new AppointmentRepository(db),
});

export const createServices = (repositories: Repositories): Services => ({
  auth: new AuthService(repositories.doctors),
  doctors: new DoctorService(repositories.doctors),
  patients: new PatientService(repositories.patients, repositories.doctors),
  appointments: new AppointmentService(repositories.appointments, repositories.patients, repositories.doctors),
});

export const createContainer = (repositories: Repositories): Container => ({
  repositories,
  services: createServices(repositories),
});
