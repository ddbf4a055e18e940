import { resolve } from 'node:path';

import type { JobConfigurationInput } from '@scriptforge/core';
import { z } from 'zod';

import { DEFAULT_OPENAI_MODEL } from './mastra/agents/script-generator-agent.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type ServiceLogLevel = (typeof LOG_LEVELS)[number];

const positiveInteger = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const credentialList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key.length > 0)
  );

const ServiceEnvironmentSchema = z.object({
  SCRIPTFORGE_MODEL: z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL),
  SCRIPTFORGE_API_KEYS: credentialList,
  SCRIPTFORGE_MAX_ATTEMPTS: positiveInteger(5),
  SCRIPTFORGE_FETCH_TIMEOUT_MS: positiveInteger(30_000),
  SCRIPTFORGE_ORACLE_TIMEOUT_MS: positiveInteger(180_000),
  SCRIPTFORGE_INSTALL_TIMEOUT_MS: positiveInteger(120_000),
  SCRIPTFORGE_RUN_TIMEOUT_MS: positiveInteger(60_000),
  SCRIPTFORGE_CREDENTIAL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(6_000),
  SCRIPTFORGE_WORK_DIR: z.string().trim().min(1).optional(),
  SCRIPTFORGE_MAX_ARTIFACT_AGE_HOURS: z.coerce.number().positive().default(24),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8_000),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export interface ServiceConfig {
  readonly model: string;
  readonly credentials: readonly string[];
  readonly maxAttempts: number;
  readonly timeouts: {
    readonly fetchMs: number;
    readonly oracleMs: number;
    readonly installMs: number;
    readonly runMs: number;
  };
  readonly credentialRetryDelayMs: number;
  readonly workDirectory: string;
  readonly maxArtifactAgeMs: number;
  readonly port: number;
  readonly host: string;
  readonly logLevel: ServiceLogLevel;
}

export const loadServiceConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ServiceConfig => {
  const parsed = ServiceEnvironmentSchema.parse(env);
  return {
    model: parsed.SCRIPTFORGE_MODEL,
    credentials: parsed.SCRIPTFORGE_API_KEYS,
    maxAttempts: parsed.SCRIPTFORGE_MAX_ATTEMPTS,
    timeouts: {
      fetchMs: parsed.SCRIPTFORGE_FETCH_TIMEOUT_MS,
      oracleMs: parsed.SCRIPTFORGE_ORACLE_TIMEOUT_MS,
      installMs: parsed.SCRIPTFORGE_INSTALL_TIMEOUT_MS,
      runMs: parsed.SCRIPTFORGE_RUN_TIMEOUT_MS
    },
    credentialRetryDelayMs: parsed.SCRIPTFORGE_CREDENTIAL_RETRY_DELAY_MS,
    workDirectory: resolve(cwd, parsed.SCRIPTFORGE_WORK_DIR ?? '.scriptforge'),
    maxArtifactAgeMs: Math.round(parsed.SCRIPTFORGE_MAX_ARTIFACT_AGE_HOURS * 60 * 60 * 1_000),
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL
  };
};

export const toJobDefaults = (config: ServiceConfig): JobConfigurationInput => ({
  model: config.model,
  credentials: config.credentials,
  maxAttempts: config.maxAttempts,
  timeouts: config.timeouts,
  credentialRetryDelayMs: config.credentialRetryDelayMs,
  maxArtifactAgeMs: config.maxArtifactAgeMs
});
