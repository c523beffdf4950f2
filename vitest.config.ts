import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        // Type-only files (interfaces, no executable code)
        'src/types/**',
        'src/backends/modelBackend.ts',
        'src/services/textInference.ts',
        // CLI command handlers (require a loaded model)
        'src/cli/**',
      ],
    },
  },
  resolve: {
    conditions: ['node'],
  },
});
