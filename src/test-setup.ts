import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  // Restore real timers if a test used vi.useFakeTimers() and threw before its own cleanup.
  vi.useRealTimers();
});
