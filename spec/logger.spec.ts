import { afterEach, describe, expect, test, vi } from 'vitest';
import { createLogger } from '../src/logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('takes its level from the options, not the environment', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(createLogger().level).toBe('info');
    expect(createLogger({ level: 'warn' }).level).toBe('warn');
  });
});
