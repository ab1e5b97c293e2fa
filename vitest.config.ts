import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./src/test-setup.ts'],
    // Bot state written by local runs.
    exclude: [...configDefaults.exclude, 'dist/**', 'server_data/**'],
  },
});
