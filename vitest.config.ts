import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      SMMBOX_API_URL:       'https://smmbox.test/api/',
      SMMBOX_API_TOKEN:     'test-token',
      SUPABASE_URL:         'https://test.supabase.co',
      SUPABASE_SERVICE_KEY: 'test-service-key',
      TELEGRAM_BOT_TOKEN:   '',
      TELEGRAM_CHAT_ID:     '',
      TEMP_DIR:             '/tmp/variant-dispatch-test',
      LOG_LEVEL:            'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts'],
    },
  },
});
