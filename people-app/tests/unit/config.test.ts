import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('applies defaults for PORT and LOG_LEVEL', () => {
    expect(loadConfig({ DATABASE_URL: 'postgres://localhost/people' })).toEqual({
      databaseUrl: 'postgres://localhost/people',
      port: 3000,
      logLevel: 'info',
    });
  });

  it('reads PORT and LOG_LEVEL', () => {
    const config = loadConfig({ DATABASE_URL: 'postgres://localhost/people', PORT: '8080', LOG_LEVEL: 'debug' });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('requires DATABASE_URL', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(/^Invalid configuration: DATABASE_URL: /);
  });

  it('rejects an out-of-range PORT', () => {
    expect(() => loadConfig({ DATABASE_URL: 'postgres://localhost/people', PORT: '70000' })).toThrow(/PORT/);
  });

  it('rejects an unknown LOG_LEVEL', () => {
    expect(() => loadConfig({ DATABASE_URL: 'postgres://localhost/people', LOG_LEVEL: 'loud' })).toThrow(
      /LOG_LEVEL/,
    );
  });
});
