import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 2582,
      recoveryWindowMs: 72 * 60 * 60 * 1000,
      exportMaxCount: 1000,
      importToken: undefined,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({ PORT: '8080', RECOVERY_WINDOW_HOURS: '1.5', IMPORT_TOKEN: 'test-secret' });

    expect(config.port).toBe(8080);
    expect(config.recoveryWindowMs).toBe(90 * 60 * 1000);
    expect(config.importToken).toBe('test-secret');
  });

  it('should reject an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid configuration: PORT');
  });
});
