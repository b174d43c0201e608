import path from "node:path";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(__dirname, "..");

const packageDirectoryMap = {
  config: path.join("core", "config"),
  io: path.join("runtime", "io"),
  tracing: path.join("runtime", "tracing"),
  types: path.join("core", "types"),
} as const satisfies Record<string, string>;

const packageAliases = Object.entries(packageDirectoryMap).flatMap(([name, relativeDir]) => {
  const basePath = path.resolve(workspaceRoot, "platform", relativeDir, "src");
  return [
    { find: `@cmdtrace/${name}`, replacement: basePath },
    { find: `@cmdtrace/${name}/`, replacement: `${basePath}/` },
  ];
});

const coverageIncludeGlobs = ["src/**/*.ts"];

export const createPackageVitestConfig = (packageName: string) =>
  defineConfig({
    resolve: {
      alias: packageAliases,
    },
    test: {
      globals: true,
      include: ["test/**/*.test.ts"],
      environment: "node",
      pool: "threads",
      coverage: {
        reporter: ["text", "json-summary"],
        include: coverageIncludeGlobs,
        reportsDirectory: path.resolve(
          workspaceRoot,
          "coverage",
          packageName
        ),
        reportOnFailure: true,
      },
    },
  });
