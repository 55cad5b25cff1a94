import path from "path";
import swaggerJsdoc from "swagger-jsdoc";
import { config } from "@/shared/config/environment";

const swaggerDefinition = {
  openapi: "3.0.0",
  info: {
    title: config.app.name,
    version: config.app.version,
    description: "Doctors manage their patients and appointments",
  },
  servers: [
    {
      url: `/api/${config.app.apiVersion}`,
      description: config.app.isDevelopment ? "Development server" : "Current server",
    },
  ],
  components: {
    securitySchemes: {
      bearerAuth: {
        type: "http",
        scheme: "bearer",
        bearerFormat: "JWT",
        description: "Enter JWT token obtained from login endpoint",
      },
    },
    parameters: {
      IdParam: {
        in: "path",
        name: "id",
        required: true,
        schema: { type: "integer", minimum: 1 },
      },
    },
    schemas: {
      ApiResponse: {
        type: "object",
        properties: {
          success: { type: "boolean", description: "Indicates if the request was successful" },
          data: { type: "object", description: "Response data (if any)" },
          message: { type: "string", description: "Human-readable message" },
          code: {
            type: "string",
            enum: [
              "VALIDATION_ERROR",
              "AUTH_ERROR",
              "NOT_FOUND",
              "CONFLICT",
              "RATE_LIMIT_EXCEEDED",
              "ROUTE_NOT_FOUND",
              "INTERNAL_ERROR",
            ],
            description: "Machine-readable error code",
          },
          errors: {
            type: "array",
            items: { $ref: "#/components/schemas/ValidationError" },
          },
        },
        required: ["success"],
      },
      ValidationError: {
        type: "object",
        properties: {
          field: { type: "string", description: "Field that failed validation" },
          message: { type: "string" },
          code: { type: "string" },
        },
        required: ["field", "message"],
      },
      Doctor: {
        type: "object",
        properties: {
          id: { type: "integer" },
          name: { type: "string" },
          email: { type: "string", format: "email" },
          specialty: { type: "string", nullable: true },
          registeredAt: { type: "string", format: "date-time" },
        },
        required: ["id", "name", "email", "registeredAt"],
      },
      RegisterDoctorRequest: {
        type: "object",
        properties: {
          name: { type: "string" },
          email: { type: "string", format: "email" },
          password: { type: "string" },
          specialty: { type: "string" },
        },
        required: ["name", "email", "password"],
      },
      LoginRequest: {
        type: "object",
        properties: {
          email: { type: "string", format: "email" },
          password: { type: "string" },
        },
        required: ["email", "password"],
      },
      AuthResponse: {
        type: "object",
        properties: {
          doctor: { $ref: "#/components/schemas/Doctor" },
          accessToken: { type: "string", description: "JWT access token" },
          tokenType: { type: "string", enum: ["Bearer"] },
          expiresIn: { type: "integer", description: "Token expiration time in seconds" },
        },
        required: ["doctor", "accessToken", "tokenType", "expiresIn"],
      },
      CreatePatientRequest: {
        type: "object",
        properties: {
          name: { type: "string" },
          age: { type: "integer", minimum: 0, maximum: 150, nullable: true },
          email: { type: "string", format: "email", nullable: true },
          phone: { type: "string", maxLength: 20, nullable: true },
          history: { type: "string", maxLength: 5000, nullable: true },
        },
        required: ["name"],
      },
      Appointment: {
        type: "object",
        properties: {
          id: { type: "integer" },
          patientId: { type: "integer" },
          doctorId: { type: "integer" },
          date: { type: "string", format: "date", example: "2025-01-10" },
          time: { type: "string", example: "09:00:00" },
          reason: { type: "string", nullable: true },
          cancelled: { type: "boolean" },
          status: { type: "string", enum: ["scheduled", "cancelled"] },
        },
        required: ["id", "patientId", "doctorId", "date", "time", "cancelled", "status"],
      },
      CreateAppointmentRequest: {
        type: "object",
        properties: {
          patientId: { type: "integer" },
          date: { type: "string", format: "date", example: "2025-01-10" },
          time: { type: "string", example: "09:00" },
          reason: { type: "string", nullable: true },
        },
        required: ["patientId", "date", "time"],
      },
    },
  },
  tags: [
    { name: "Authentication", description: "Doctor registration and login" },
    { name: "Doctors", description: "Current doctor's account" },
    { name: "Patients", description: "Patient records" },
    { name: "Appointments", description: "Appointment scheduling and cancellation" },
  ],
};

// Annotated routers live beside this file's sources whether run from src/ or dist/
const sourceRoot = path.resolve(__dirname, "../..");

const options: swaggerJsdoc.Options = {
  definition: swaggerDefinition,
  apis: [path.join(sourceRoot, "domains/**/routes/*.{ts,js}")],
};

export const createSwaggerSpec = (): object => {
  return swaggerJsdoc(options);
};
