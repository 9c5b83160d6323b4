import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Specs create temporary directories under the OS tmpdir
    testTimeout: 15000,
  },
});
