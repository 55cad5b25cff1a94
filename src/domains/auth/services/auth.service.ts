import jwt, { type JwtPayload } from "jsonwebtoken";
import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";
import { AuthError, ConflictError } from "@/shared/types/common.types";
import type { AccessTokenClaims, AuthResponse, LoginRequest, RegisterDoctorRequest } from "@/shared/types/auth.types";
import { hashPassword, verifyPassword } from "@/shared/utils/crypto";
import { withoutCredentials, type IDoctorRepository, type PublicDoctor } from "@/domains/doctors/models/doctor.model";

const moduleLogger = createModuleLogger("AuthService");

const INVALID_CREDENTIALS = "Invalid email or password";

export class AuthService {
  constructor(private doctorRepository: IDoctorRepository) {}

  async register(registerData: RegisterDoctorRequest): Promise<PublicDoctor> {
    const email = this.normalizeEmail(registerData.email);

    const existingDoctor = await this.doctorRepository.findByEmailWithCredentials(email);
    if (existingDoctor) {
      throw new ConflictError("A doctor with this email is already registered");
    }

    const passwordHash = await hashPassword(registerData.password, config.auth.saltRounds);

    const doctor = await this.doctorRepository.create({
      name: registerData.name.trim(),
      email,
      passwordHash,
      specialty: registerData.specialty?.trim() || null,
    });

    moduleLogger.info({ doctorId: doctor.id, specialty: doctor.specialty }, "Doctor registered successfully");

    return doctor;
  }

  async login(loginData: LoginRequest): Promise<AuthResponse> {
    const doctor = await this.doctorRepository.findByEmailWithCredentials(this.normalizeEmail(loginData.email));

    if (!doctor) {
      moduleLogger.warn({ reason: "unknown_email" }, "Login failed");
      throw new AuthError(INVALID_CREDENTIALS);
    }

    const isValidPassword = await verifyPassword(loginData.password, doctor.passwordHash);

    if (!isValidPassword) {
      moduleLogger.warn({ doctorId: doctor.id, reason: "invalid_password" }, "Login failed");
      throw new AuthError(INVALID_CREDENTIALS);
    }

    const publicDoctor = withoutCredentials(doctor);
    const expiresIn = this.getTokenExpiresIn(config.auth.accessExpiresIn);

    moduleLogger.info({ doctorId: doctor.id }, "Doctor logged in successfully");

    return {
      doctor: publicDoctor,
      accessToken: this.generateAccessToken(publicDoctor, expiresIn),
      tokenType: "Bearer",
      expiresIn,
    };
  }

  /**
   * Returns the doctor id carried by a valid access token.
   */
  verifyAccessToken(token: string): number {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, config.auth.accessSecret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthError("Token expired");
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new AuthError("Invalid token");
      }
      throw error;
    }

    const doctorId = typeof payload === "string" ? NaN : Number(payload.sub);

    if (!Number.isInteger(doctorId) || doctorId <= 0) {
      throw new AuthError("Invalid token");
    }

    return doctorId;
  }

  // Private helper methods
  private normalizeEmail(email: string): string {
    return email.toLowerCase().trim();
  }

  private generateAccessToken(doctor: PublicDoctor, expiresIn: number): string {
    const claims: AccessTokenClaims = {
      sub: String(doctor.id),
      email: doctor.email,
    };

    return jwt.sign(claims, config.auth.accessSecret, { expiresIn });
  }

  private getTokenExpiresIn(expiresIn: string): number {
    // Convert string like "7d", "15m", "1h" to seconds
    const match = expiresIn.match(/^(\d+)([smhd])$/);
    if (!match) return 3600; // Default 1 hour

    const value = parseInt(match[1] ?? "1", 10);
    const unit = match[2];

    switch (unit) {
      case "s":
        return value;
      case "m":
        return value * 60;
      case "h":
        return value * 3600;
      case "d":
        return value * 86400;
      default:
        return 3600;
    }
  }
}
