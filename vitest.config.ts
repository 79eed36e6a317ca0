import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
      DELAY_LISTADO_MS: '0',
      DELAY_DETALLE_MS: '0',
    },
  },
});
