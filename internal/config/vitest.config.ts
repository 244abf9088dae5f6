import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    reporters: ["default"],
    include: ["src/**/*.test.ts"],
    env: {
      SKIP_ENV_VALIDATION: "true",
      NODE_ENV: "test",
    },
  },
})
