import { fileURLToPath } from "node:url";
import { defineConfig, configDefaults } from "vitest/config";

const sharedDir = fileURLToPath(new URL("./shared/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@pgweave\/shared\/(.*)\.js$/, replacement: `${sharedDir}$1.ts` },
    ],
  },
  test: {
    include: ["shared/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "dist/**"],
    coverage: {
      provider: "v8",
      include: ["shared/**/*.ts", "packages/*/src/**/*.ts"],
      exclude: ["**/*.test.ts", "**/node_modules/**"],
    },
  },
});
