import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      NODE_ENV: "test",
      MONGODB_URI: "mongodb://localhost:27017/scholarship-test",
      ALLOWED_ORIGINS: "http://localhost:3000",
      JWT_SECRET: "test-secret-test-secret-test-secret-0000",
      APPLICATION_SLA_DAYS: "30",
      ENFORCE_APPROVED_AMOUNT_CEILING: "true",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/*.spec.ts", "src/test/**"],
    },
  },
});
