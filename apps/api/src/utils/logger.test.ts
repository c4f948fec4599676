import { describe, it, expect } from 'vitest';
import { createLoggerOptions } from './logger.js';

describe('createLoggerOptions', () => {
  it('should be silent under test', () => {
    expect(createLoggerOptions('test', undefined)).toEqual({ level: 'silent', transport: undefined });
  });

  it('should pretty-print at debug level in development', () => {
    const options = createLoggerOptions('development', undefined);

    expect(options.level).toBe('debug');
    expect(options.transport).toMatchObject({ target: 'pino-pretty' });
  });

  it('should log structured info in production', () => {
    expect(createLoggerOptions('production', undefined)).toEqual({ level: 'info', transport: undefined });
  });

  it('should let an explicit level win', () => {
    expect(createLoggerOptions('production', 'warn').level).toBe('warn');
  });
});
