import { afterEach, vi } from 'vitest';
import { setLogLevel } from '../src/core/logger.js';

setLogLevel('silent');

afterEach(() => {
  vi.unstubAllGlobals();
});
