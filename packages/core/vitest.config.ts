import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@bintrace/core",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
