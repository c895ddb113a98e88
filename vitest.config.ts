import { defineConfig } from "vitest/config";

const sharedEntry = new URL("./shared/src/index.ts", import.meta.url).pathname;

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "shared",
          root: "./shared",
          include: ["src/**/*.test.ts"],
        },
      },
      {
        resolve: {
          alias: {
            "@brokerstream/shared": sharedEntry,
          },
        },
        test: {
          name: "client",
          root: "./client",
          include: ["src/**/*.test.ts"],
        },
      },
    ],
  },
});
