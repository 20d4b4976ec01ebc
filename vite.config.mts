import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: 'node',
    // Fills the environment before @env/index parses it
    setupFiles: ['./src/tests/setup-env.ts'],
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/{models,aggregator,providers,lib}/**/*.spec.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'use-cases',
          include: ['src/use-cases/**/*.spec.ts'],
        },
      },
    ],
  },
})
