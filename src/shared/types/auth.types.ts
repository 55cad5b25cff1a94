import type { PublicDoctor } from "@/domains/doctors/models/doctor.model";

// Claims carried by the access token; `sub` is the doctor id
export interface AccessTokenClaims {
  sub: string;
  email: string;
}

// Authentication request/response types
export interface RegisterDoctorRequest {
  name: string;
  email: string;
  password: string;
  specialty?: string | undefined;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface AuthResponse {
  doctor: PublicDoctor;
  accessToken: string;
  tokenType: "Bearer";
  expiresIn: number;
}

// Auth middleware extended request
declare global {
  namespace Express {
    interface Request {
      doctor?: PublicDoctor;
      correlationId?: string;
    }
  }
}
