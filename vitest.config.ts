import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'html'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '**/*.d.ts',
        '**/types.ts',
        '**/*.config.ts',
        '**/index.ts', // Re-exports and CLI entrypoint
      ],
    },
    testTimeout: 15000,
    hookTimeout: 15000,
    reporters: ['default'],
    pool: 'forks',
  },
});
