import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { LocalFileSystemArtifactStore } from '@scriptforge/artifact-store';
import { JobConfigurationSchema, type ExecutionResult, type GeneratedArtifact } from '@scriptforge/core';
import { isJobLogEvent, type JobLogger, type JobStreamEvent } from '@scriptforge/core/jobs';

import type { GenerationOracle } from '../oracle/types.js';
import type { ExecutionSandbox } from '../sandbox/types.js';
import { startJobTask, type JobTask, type StartJobTaskOptions } from './job-task.js';

const JOB_ID = 'run_fedcba9876543210fedcba9876543210';

const ARTIFACT: GeneratedArtifact = {
  scriptText: 'console.log(JSON.stringify([{ title: "Spring tides arrive early" }]));',
  dependencyManifestText: ''
};

const oracle: GenerationOracle = { generate: async () => ARTIFACT };

const createLogger = (): JobLogger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

const succeedingSandbox: ExecutionSandbox = {
  execute: async (): Promise<ExecutionResult> => ({
    kind: 'completed',
    exitCode: 0,
    stdout: '[{"title":"Spring tides arrive early"}]',
    stderr: ''
  })
};

const collect = async (task: JobTask): Promise<JobStreamEvent[]> => {
  const events: JobStreamEvent[] = [];
  for await (const event of task.events()) {
    events.push(event);
  }
  return events;
};

describe('startJobTask', () => {
  let directory: string;
  let baseOptions: StartJobTaskOptions;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'job-task-'));
    baseOptions = {
      jobId: JOB_ID,
      url: 'https://news.example.com/tides',
      objective: 'get the article headline',
      configuration: JobConfigurationSchema.parse({
        model: 'gpt-test',
        credentials: ['first-test-key'],
        maxAttempts: 2
      }),
      oracle,
      sandbox: succeedingSandbox,
      store: new LocalFileSystemArtifactStore({ directory }),
      fetchDocument: async () => '<html><body><article><h2>Spring tides arrive early</h2></article></body></html>',
      logger: createLogger()
    };
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('streams log lines followed by exactly one result', async () => {
    const task = startJobTask(baseOptions);
    const events = await collect(task);
    const outcome = await task.completion;

    expect(task.jobId).toBe(JOB_ID);
    expect(outcome.state).toBe('succeeded');
    expect(events.at(-1)).toEqual(outcome.result);
    expect(events.slice(0, -1).every(isJobLogEvent)).toBe(true);
    expect(events.filter((event) => !isJobLogEvent(event))).toHaveLength(1);
    expect(events[0]).toEqual({ log: `Starting scraping job with run_id: ${JOB_ID}` });
  });

  it('stops after the running attempt when cancelled', async () => {
    const generate = vi.fn(async () => ARTIFACT);
    const task: JobTask = startJobTask({
      ...baseOptions,
      oracle: { generate },
      sandbox: {
        execute: async () => {
          task.cancel();
          return { kind: 'completed', exitCode: 1, stdout: '', stderr: 'ReferenceError: cheerio is not defined' };
        }
      }
    });

    const outcome = await task.completion;

    expect(outcome.result).toEqual({ status: 'error', message: 'Scraping job was cancelled.' });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('resolves with a failed outcome when the job itself throws', async () => {
    const logger = createLogger();
    vi.mocked(logger.info).mockImplementation(() => {
      throw new Error('logger offline');
    });

    const task = startJobTask({ ...baseOptions, logger });
    const outcome = await task.completion;

    expect(outcome).toEqual({
      jobId: JOB_ID,
      state: 'failed',
      result: { status: 'error', message: 'Unexpected error occurred: logger offline' },
      attempts: []
    });
    await expect(collect(task)).resolves.toEqual([outcome.result]);
    expect(logger.error).toHaveBeenCalledWith('Scraping job aborted unexpectedly', {
      jobId: JOB_ID,
      error: 'logger offline'
    });
  });
});
