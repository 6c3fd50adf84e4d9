import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["docqa-main/tests/**/*.test.ts", "docqa-web/tests/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
