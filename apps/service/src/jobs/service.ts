import type { ArtifactStore, DownloadEntry, SweepReport } from '@scriptforge/artifact-store';
import {
  JobConfigurationSchema,
  ScrapeRequestSchema,
  type JobConfiguration,
  type JobConfigurationInput,
  type JobSettings
} from '@scriptforge/core';
import type { JobLogger, JobOutcome, ProgressObserver } from '@scriptforge/core/jobs';
import type { z } from 'zod';

import { MastraGenerationOracle } from '../oracle/mastra-oracle.js';
import type { GenerationOracle } from '../oracle/types.js';
import { fetchDocument as fetchWithHttp, type DocumentFetcher } from '../orchestrator/fetcher.js';
import { runScrapingJob } from '../orchestrator/index.js';
import { SpawnExecutionSandbox } from '../sandbox/spawn-sandbox.js';
import type { ExecutionSandbox } from '../sandbox/types.js';
import { startJobTask, type JobTask } from './job-task.js';

export type ScrapeRequestInput = z.input<typeof ScrapeRequestSchema>;

export type OracleFactory = (configuration: JobConfiguration, logger: JobLogger) => GenerationOracle;
export type SandboxFactory = (configuration: JobConfiguration, logger: JobLogger) => ExecutionSandbox;

export interface ScrapeJobServiceOptions {
  readonly store: ArtifactStore;
  readonly logger: JobLogger;
  readonly defaults: JobConfigurationInput;
  readonly fetchDocument?: DocumentFetcher;
  readonly createOracle?: OracleFactory;
  readonly createSandbox?: SandboxFactory;
  readonly progressCapacity?: number;
}

export interface RunJobOptions {
  readonly onProgress?: ProgressObserver;
  readonly signal?: AbortSignal;
}

export const createMastraOracle: OracleFactory = (configuration, logger) =>
  new MastraGenerationOracle({
    credentials: configuration.credentials,
    model: configuration.model,
    timeoutMs: configuration.timeouts.oracleMs,
    credentialRetryDelayMs: configuration.credentialRetryDelayMs,
    logger
  });

export const createSpawnSandbox: SandboxFactory = (configuration, logger) =>
  new SpawnExecutionSandbox({
    installTimeoutMs: configuration.timeouts.installMs,
    runTimeoutMs: configuration.timeouts.runMs,
    logger
  });

/** Per-request settings override the model, the credentials and the run timeout. */
export const resolveJobConfiguration = (
  defaults: JobConfigurationInput,
  settings: JobSettings
): JobConfiguration =>
  JobConfigurationSchema.parse({
    ...defaults,
    model: settings.model ?? defaults.model,
    credentials: settings.apiKeys.length > 0 ? settings.apiKeys : defaults.credentials,
    maxAttempts: settings.maxAttempts ?? defaults.maxAttempts,
    timeouts: {
      ...defaults.timeouts,
      runMs: settings.timeout !== undefined ? settings.timeout * 1_000 : defaults.timeouts?.runMs
    }
  });

export class ScrapeJobService {
  private readonly store: ArtifactStore;
  private readonly logger: JobLogger;
  private readonly defaults: JobConfigurationInput;
  private readonly fetchDocument: DocumentFetcher;
  private readonly createOracle: OracleFactory;
  private readonly createSandbox: SandboxFactory;
  private readonly progressCapacity?: number;

  constructor(options: ScrapeJobServiceOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.defaults = options.defaults;
    this.fetchDocument = options.fetchDocument ?? fetchWithHttp;
    this.createOracle = options.createOracle ?? createMastraOracle;
    this.createSandbox = options.createSandbox ?? createSpawnSandbox;
    this.progressCapacity = options.progressCapacity;
  }

  private prepare(input: ScrapeRequestInput) {
    const request = ScrapeRequestSchema.parse(input);
    const configuration = resolveJobConfiguration(this.defaults, request.settings);
    return {
      url: request.url,
      objective: request.prompt,
      configuration,
      oracle: this.createOracle(configuration, this.logger),
      sandbox: this.createSandbox(configuration, this.logger),
      store: this.store,
      fetchDocument: this.fetchDocument,
      logger: this.logger
    };
  }

  /** Runs a job to completion. Rejects only when the request itself is invalid. */
  async run(input: ScrapeRequestInput, options: RunJobOptions = {}): Promise<JobOutcome> {
    return runScrapingJob({ ...this.prepare(input), onProgress: options.onProgress, signal: options.signal });
  }

  /** Starts a job in the background; throws synchronously for an invalid request. */
  start(input: ScrapeRequestInput): JobTask {
    return startJobTask({ ...this.prepare(input), progressCapacity: this.progressCapacity });
  }

  resolveDownload(jobId: string): Promise<DownloadEntry | undefined> {
    return this.store.resolveDownload(jobId);
  }

  listDownloads(): Promise<readonly DownloadEntry[]> {
    return this.store.listDownloads();
  }

  sweep(maxAgeMs?: number): Promise<SweepReport> {
    return this.store.sweep(maxAgeMs ?? JobConfigurationSchema.parse(this.defaults).maxArtifactAgeMs);
  }
}
