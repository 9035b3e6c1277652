import { defineConfig, defineProject } from "vitest/config"

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `client`,
          include: [`packages/client/test/**/*.test.ts`],
          exclude: [`**/node_modules/**`],
        },
      }),
    ],
  },
})
