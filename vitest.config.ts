import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.test.ts',
        '**/types.ts',
        'vitest.config.ts',
      ],
      thresholds: {
        lines: 60,
        functions: 70,
        branches: 70,
        statements: 60,
      },
    },
    setupFiles: ['./tests/setup.ts'],
  },
});
