import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts", "src/**/__tests__/**/*.{test,spec}.ts", "src/**/*.{test,spec}.ts"],
    pool: "threads",
  },
})
