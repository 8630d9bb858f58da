import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const srcDir = fileURLToPath(new URL('./src', import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.test.ts',
      ],
      include: ['src/**/*.ts'],
    },
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: `${srcDir}/$1.ts`,
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: `${srcDir}/services/$1.ts`,
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: `${srcDir}/utils/$1.ts`,
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: `${srcDir}/schemas/$1.ts`,
      },
      // Regular aliases without .js extension
      { find: '@root', replacement: srcDir },
      { find: '@services', replacement: `${srcDir}/services` },
      { find: '@utils', replacement: `${srcDir}/utils` },
      { find: '@schemas', replacement: `${srcDir}/schemas` },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
