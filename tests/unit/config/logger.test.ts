/**
 * Logger unit tests
 * Verify electron-log v5 configuration and the structured logging helper
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import log from 'electron-log/node';
import { logger } from '@/config/logger.js';

describe('Logger Configuration', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should disable the file transport under test', () => {
    expect(log.transports.file.level).toBe(false);
  });

  it('should emit structured entries with module, message and context', () => {
    logger.info('MboxParser', 'Parsed file', { messages: 3 });

    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'INFO',
        module: 'MboxParser',
        message: 'Parsed file',
        timestamp: expect.any(Number),
        messages: 3,
      })
    );
  });

  it('should route each level to the matching transport call', () => {
    logger.debug('Mod', 'debug message');
    logger.warn('Mod', 'warn message');

    expect(log.debug).toHaveBeenCalledWith(expect.objectContaining({ level: 'DEBUG', message: 'debug message' }));
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ level: 'WARN', message: 'warn message' }));
  });

  it('should serialize error objects to message, stack and name', () => {
    const error = new TypeError('bad value');

    logger.error('EmailStore', 'Insert failed', error, { archive: 'a.pst' });

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'ERROR',
        module: 'EmailStore',
        message: 'Insert failed',
        error: { message: 'bad value', stack: error.stack, name: 'TypeError' },
        archive: 'a.pst',
      })
    );
  });

  it('should stringify non-Error values', () => {
    logger.error('Mod', 'Odd failure', 'plain string');

    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ error: 'plain string' }));
  });
});
