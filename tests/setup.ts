/**
 * Vitest setup file
 * Configure test environment before running tests
 */

import { vi } from 'vitest';

// Set environment variables for tests
process.env.NODE_ENV = 'test';
process.env.VITEST = 'true';

// Mock electron-log to avoid console and file I/O in tests
vi.mock('electron-log/node', () => ({
  default: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    transports: {
      file: {
        level: false,
        resolvePathFn: () => '',
      },
      console: {
        level: 'debug',
      },
    },
  },
}));
