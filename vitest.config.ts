import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    globals: true, // Tests still import from vitest explicitly
    restoreMocks: true,
  },
});
