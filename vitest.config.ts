import { defineConfig } from 'vitest/config';

// Spawn real child processes — keep sequential
const processFiles = [
  'src/core/execution/__tests__/process-runner.test.ts',
  'src/agents/__tests__/invoker.process.test.ts',
];

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['node_modules', 'dist', '.git', '.cache', 'sessions'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
      ],
    },
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/**/*.{test,spec}.ts'],
          exclude: [...processFiles, 'node_modules', 'dist'],
          pool: 'forks',
          testTimeout: 30000,
          hookTimeout: 30000,
        },
      },
      {
        extends: true,
        test: {
          name: 'process',
          include: [...processFiles],
          pool: 'forks',
          maxWorkers: 1,
          fileParallelism: false,
          testTimeout: 60000,
          hookTimeout: 60000,
        },
      },
    ],
  },
});
