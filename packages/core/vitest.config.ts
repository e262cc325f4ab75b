import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecta/core",
    globals: true,
    environment: "node",
  },
});
