import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["backend/__tests__/**/*.test.ts", "backend/test/**/*.test.ts"],
    setupFiles: ["backend/__tests__/setup.ts"],
    environment: "node",
  },
});
