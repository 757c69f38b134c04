import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: [
      "apps/*/src/**/*.{test,spec}.ts",
      "packages/*/src/**/*.{test,spec}.ts",
    ],
    environment: "node",
    env: {
      FACECUE_LOG_LEVEL: "silent",
    },
    reporters: process.env.CI ? ["default", "junit"] : ["default"],
    outputFile: process.env.CI ? { junit: "coverage/junit.xml" } : undefined,
  },
  resolve: {
    alias: [
      {
        find: /^@facecue\/([^/]+)(.*)$/,
        replacement: `${path.resolve(rootDir, "packages")}/$1/src$2`,
      },
    ],
  },
});
