import { fileURLToPath } from "node:url";

import { defineConfig, defineProject } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

const aliases = [
  {
    find: "@agentloom/agent-runtime-core",
    replacement: `${root}packages/agent-runtime-core/src/index.ts`,
  },
  {
    find: "@agentloom/agent-runtime-execution",
    replacement: `${root}packages/agent-runtime-execution/src/index.ts`,
  },
  {
    find: "@agentloom/agent-runtime",
    replacement: `${root}packages/agent-runtime/src/index.ts`,
  },
];

function packageProject(name: string, directory: string) {
  return defineProject({
    resolve: {
      alias: aliases,
    },
    test: {
      name,
      include: [`packages/${directory}/src/**/__tests__/**/*.test.ts`],
      exclude: defaultExclude,
      environment: "node",
      env: {
        LOG_LEVEL: "silent",
      },
    },
  });
}

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    exclude: defaultExclude,
    projects: [
      packageProject("runtime-core", "agent-runtime-core"),
      packageProject("runtime-execution", "agent-runtime-execution"),
      packageProject("runtime-orchestration", "agent-runtime"),
    ],
  },
});
