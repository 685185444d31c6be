import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../../../src/infrastructure/logging/createLogger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should tag entries with the service name', () => {
    const logger = createLogger('engine');
    expect(logger.defaultMeta).toEqual({ service: 'engine' });
  });

  it('should be silent under test unless TEST_LOG_LEVEL is set', () => {
    vi.stubEnv('NODE_ENV', 'test');
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('TEST_LOG_LEVEL', '');
    expect(createLogger('engine').transports[0]?.silent).toBe(true);

    vi.stubEnv('TEST_LOG_LEVEL', 'debug');
    const verbose = createLogger('engine');
    expect(verbose.transports[0]?.silent).toBe(false);
    expect(verbose.level).toBe('debug');
  });

  it('should take the level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    expect(createLogger('cli').level).toBe('info');
  });

  it('should prefer an explicit level', () => {
    expect(createLogger('cli', 'error').level).toBe('error');
  });
});
