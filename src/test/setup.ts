import { afterEach, vi } from 'vitest';

// Tests that stub the global fetch or spy on modules must not leak into each other
afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
