// Auth domain exports
export * from "./controllers/auth.controller";
export * from "./services/auth.service";
export * from "./validators/auth.validator";
export * from "./routes/auth.routes";
