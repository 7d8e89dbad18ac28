import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup-env.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      all: true,
      include: ['src/**/*.ts'],
      // Thin CDP/audio bindings that need a live browser or sound device.
      exclude: ['src/browser/chromeLifecycle.ts', 'src/browser/cdpPageDriver.ts', 'src/speech/playback.ts'],
    },
  },
});
