import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@nwa-stdlib/fp",
    globals: true,
    environment: "node",
  },
});
