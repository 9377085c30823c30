import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: `syndication-reader`,
    include: [`tests/**/*.test.ts`],
    environment: `node`,
    testTimeout: 10000,
  },
})
