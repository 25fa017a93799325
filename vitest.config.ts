import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    env: {
      HOLDGATE_HOME: path.join(os.tmpdir(), 'holdgate-vitest'),
      HOLDGATE_SILENT: '1',
    },
  },
});
