import { defineConfig } from "vitest/config";

// Device report timestamps are rendered in local time.
process.env.TZ = "UTC";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      TZ: "UTC",
    },
    exclude: ["node_modules/**", "dist/**", "output/**"],
  },
});
