import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadServiceConfig, toJobDefaults } from './config.js';

describe('loadServiceConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadServiceConfig({}, '/srv/app')).toEqual({
      model: 'gpt-4.1-mini',
      credentials: [],
      maxAttempts: 5,
      timeouts: { fetchMs: 30_000, oracleMs: 180_000, installMs: 120_000, runMs: 60_000 },
      credentialRetryDelayMs: 6_000,
      workDirectory: '/srv/app/.scriptforge',
      maxArtifactAgeMs: 86_400_000,
      port: 8_000,
      host: '0.0.0.0',
      logLevel: 'info'
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadServiceConfig(
      {
        SCRIPTFORGE_MODEL: 'gpt-test',
        SCRIPTFORGE_API_KEYS: ' first-test-key, ,second-test-key ',
        SCRIPTFORGE_MAX_ATTEMPTS: '3',
        SCRIPTFORGE_RUN_TIMEOUT_MS: '15000',
        SCRIPTFORGE_CREDENTIAL_RETRY_DELAY_MS: '0',
        SCRIPTFORGE_WORK_DIR: 'tmp/work',
        SCRIPTFORGE_MAX_ARTIFACT_AGE_HOURS: '1.5',
        PORT: '9000',
        LOG_LEVEL: 'debug'
      },
      '/srv/app'
    );

    expect(config).toMatchObject({
      model: 'gpt-test',
      credentials: ['first-test-key', 'second-test-key'],
      maxAttempts: 3,
      credentialRetryDelayMs: 0,
      workDirectory: '/srv/app/tmp/work',
      maxArtifactAgeMs: 5_400_000,
      port: 9_000,
      logLevel: 'debug'
    });
    expect(config.timeouts.runMs).toBe(15_000);
  });

  it('rejects malformed values', () => {
    expect(() => loadServiceConfig({ SCRIPTFORGE_MAX_ATTEMPTS: 'many' })).toThrow(ZodError);
    expect(() => loadServiceConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });

  it('maps to job defaults', () => {
    const config = loadServiceConfig({ SCRIPTFORGE_API_KEYS: 'first-test-key' }, '/srv/app');

    expect(toJobDefaults(config)).toEqual({
      model: 'gpt-4.1-mini',
      credentials: ['first-test-key'],
      maxAttempts: 5,
      timeouts: { fetchMs: 30_000, oracleMs: 180_000, installMs: 120_000, runMs: 60_000 },
      credentialRetryDelayMs: 6_000,
      maxArtifactAgeMs: 86_400_000
    });
  });
});
