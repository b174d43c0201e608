import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./platform/core/types/vitest.config.ts", "./platform/core/types"],
  ["./platform/core/config/vitest.config.ts", "./platform/core/config"],
  ["./platform/runtime/io/vitest.config.ts", "./platform/runtime/io"],
  ["./platform/runtime/tracing/vitest.config.ts", "./platform/runtime/tracing"],
] as const;

export default defineConfig({
  test: {
    projects: workspaceProjects.map(([configPath, root]) => ({
      root,
      extends: configPath,
    })),
  },
});
