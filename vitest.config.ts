import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      JWT_SECRET: 'test-secret',
      BCRYPT_SALT_ROUNDS: '4',
      UPLOAD_DIR: 'tmp/test-uploads',
    },
    testTimeout: 10000,
  },
});
