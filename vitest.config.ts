import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    include: ["app/**/*.test.ts"],
    environment: "node",
    // Report dates are rendered in local time
    env: {
      TZ: "UTC",
      LOG_LEVEL: "silent",
    },
  },
});
