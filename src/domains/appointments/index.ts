// Appointments domain exports
export * from "./controllers/appointment.controller";
export * from "./services/appointment.service";
export * from "./repositories/appointment.repository";
export * from "./models/appointment.model";
export * from "./validators/appointment.validator";
export * from "./routes/appointment.routes";
