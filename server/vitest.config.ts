import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text"],
      include: ["src/**/*.ts"],
      // Live adapters that call the model API; exercised only against real services.
      exclude: ["src/pipeline/generative.ts"],
      thresholds: {
        lines: 85,
        functions: 85,
        statements: 85,
        // Blender process handling and loop guards are only partly reachable without Blender.
        branches: 75
      }
    }
  }
});
