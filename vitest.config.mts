// /vitest.config.mts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/services/*/test/**/*.spec.ts"],
    setupFiles: ["backend/services/shared/test/setup.ts"],
    testTimeout: 15_000,
  },
});
