import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  // Interpreter tests switch to fake timers for the confirmation window.
  vi.useRealTimers();
});
