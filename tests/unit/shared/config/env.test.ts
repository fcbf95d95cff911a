import { afterEach, describe, expect, it, vi } from 'vitest';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe('environment config', () => {
  it('reads recognised values', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.resetModules();

    const { env } = await import('../../../../src/shared/config/env.js');

    expect(env).toEqual({ NODE_ENV: 'production', LOG_LEVEL: 'warn' });
  });

  it('falls back to the defaults for unrecognised values', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.resetModules();

    const { env } = await import('../../../../src/shared/config/env.js');

    expect(env).toEqual({ NODE_ENV: 'development', LOG_LEVEL: 'info' });
  });

  it('still loads the package entry point under an unknown NODE_ENV', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.stubEnv('LOG_LEVEL', 'silent');
    vi.resetModules();

    const entry = await import('../../../../src/index.js');

    expect(typeof entry.createGifPlayback).toBe('function');
  });
});
