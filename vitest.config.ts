import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "src"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      DB_NAME: "clinic_test",
      DB_USER: "clinic",
      DB_PASSWORD: "test-password",
      JWT_ACCESS_SECRET: "test-secret-test-secret-test-secret",
      JWT_ACCESS_EXPIRES_IN: "1h",
      BCRYPT_SALT_ROUNDS: "4",
      RATE_LIMIT_MAX_REQUESTS: "10000",
      LOG_LEVEL: "silent",
      LOG_FORMAT: "json",
      SWAGGER_ENABLED: "false",
    },
  },
});
