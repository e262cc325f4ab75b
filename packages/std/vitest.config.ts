import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecta/std",
    globals: true,
    environment: "node",
  },
});
