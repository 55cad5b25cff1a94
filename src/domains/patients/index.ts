// Patients domain exports
export * from "./controllers/patient.controller";
export * from "./services/patient.service";
export * from "./repositories/patient.repository";
export * from "./models/patient.model";
export * from "./validators/patient.validator";
export * from "./routes/patient.routes";
