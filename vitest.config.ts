import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["inventory-service/src/**/*.test.ts"],
    restoreMocks: true,
  },
});
