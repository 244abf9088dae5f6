import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    reporters: ["default"],
    include: ["src/**/*.test.ts"],
  },
})
