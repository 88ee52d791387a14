import { defineConfig, configDefaults } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/test/**/*.test.ts", "packages/core/test/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "dist/**"],
    coverage: {
      provider: "v8",
      include: ["shared/executor/**", "packages/core/src/**"],
    },
  },
});
