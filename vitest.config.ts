import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.{test,spec}.ts', 'tests/integration/**/*.{test,spec}.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    env: { DOCX_BITS_LOG_LEVEL: 'silent' },
  },
});
