import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],

    // Тесты запускают дочерние процессы
    pool: 'forks',
    testTimeout: 15000,
  },
});
