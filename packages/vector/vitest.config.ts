import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@vecta/vector",
    globals: true,
    environment: "node",
  },
});
