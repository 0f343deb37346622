import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Mirrors tsconfig.json "paths"
    alias: {
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@events': fromRoot('./src/events'),
      '@hardware': fromRoot('./src/hardware'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
      '$types': fromRoot('./src/types'),
    },
  },
})
