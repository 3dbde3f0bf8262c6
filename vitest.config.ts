import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
  // Manifest tests work in per-test temp dirs, but a single fork keeps log output readable.
  pool: 'forks',
  poolOptions: { forks: { singleFork: true } },
  include: ['src/tests/**/*.spec.ts'],
  testTimeout: 15000,
  hookTimeout: 30000,
    exclude: [
      'dist/**'
  ,'node_modules/**'
    ],
    env: {
      CATALOG_LOG_LEVEL: 'error'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: 'coverage',
      include: [
        'src/config/**',
        'src/services/**',
        'src/utils/**',
        'src/models/**',
        'src/versioning/**'
      ],
      exclude: [
        'dist/**',
        'src/tests/**',
        '**/*.d.ts'
      ]
    }
  }
});
