import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts", "server/**/__tests__/**/*.spec.ts", "cli/**/__tests__/**/*.spec.ts"],
    restoreMocks: true,
  },
});
