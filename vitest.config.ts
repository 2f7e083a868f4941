import { defineConfig } from "vitest/config";
import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: defaultExclude,
    environment: "node",
    server: {
      deps: {
        inline: [/@docweave\/.*/],
      },
    },
  },
});
