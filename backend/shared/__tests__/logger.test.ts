import { afterEach, describe, expect, it, vi } from 'vitest';
import { log, setLogLevel } from '../logger';

describe('log', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('writes one JSON line with service and context', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('info', 'Request authorized', { tenantId: 'acme', sub: undefined });

    const entry = JSON.parse(String(out.mock.calls[0][0]));
    expect(entry).toEqual({
      level: 'info',
      message: 'Request authorized',
      timestamp: expect.any(String),
      service: 'tenant-gateway-authorizer',
      tenantId: 'acme',
    });
  });

  it('routes warn and error to their console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    log('warn', 'w');
    log('error', 'e');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('drops entries below the configured level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    setLogLevel('warn');
    log('debug', 'd');
    log('info', 'i');
    log('warn', 'w');

    expect(out).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('hides debug by default', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('debug', 'd');
    setLogLevel('debug');
    log('debug', 'd');

    expect(out).toHaveBeenCalledTimes(1);
  });
});
