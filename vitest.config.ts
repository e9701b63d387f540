import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/@kiln/*/tests/**/*.spec.ts"],
  },
});
