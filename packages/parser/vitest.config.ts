import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@bintrace/parser",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
