import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { JobLogger } from '@scriptforge/core/jobs';

import { SpawnExecutionSandbox, type SandboxCommand } from './spawn-sandbox.js';

const nodeEval = (source: string): SandboxCommand => ({ command: process.execPath, args: ['-e', source] });

const logger: JobLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('SpawnExecutionSandbox', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'sandbox-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const createSandbox = (install: SandboxCommand, run: SandboxCommand, runTimeoutMs = 10_000) =>
    new SpawnExecutionSandbox({ installTimeoutMs: 10_000, runTimeoutMs, logger, install, run });

  it('captures stdout of a completed run', async () => {
    const sandbox = createSandbox(nodeEval(''), nodeEval('console.log(JSON.stringify([1, 2]))'));

    await expect(sandbox.execute(directory)).resolves.toEqual({
      kind: 'completed',
      exitCode: 0,
      stdout: '[1,2]\n',
      stderr: ''
    });
  });

  it('reports non-zero exits as completed runs', async () => {
    const sandbox = createSandbox(nodeEval(''), nodeEval('console.error("bad selector"); process.exit(3)'));

    await expect(sandbox.execute(directory)).resolves.toEqual({
      kind: 'completed',
      exitCode: 3,
      stdout: '',
      stderr: 'bad selector\n'
    });
  });

  it('stops before running when the install fails', async () => {
    const run = nodeEval('console.log("should not run")');
    const sandbox = createSandbox(nodeEval('console.error("E404 not found"); process.exit(1)'), run);

    await expect(sandbox.execute(directory)).resolves.toEqual({
      kind: 'install-failed',
      exitCode: 1,
      stdout: '',
      stderr: 'E404 not found\n'
    });
  });

  it('reports spawn errors as failed installs', async () => {
    const sandbox = createSandbox({ command: join(directory, 'missing-binary'), args: [] }, nodeEval(''));
    const result = await sandbox.execute(directory);

    expect(result.kind).toBe('install-failed');
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('ENOENT');
  });

  it('kills runs that exceed their timeout', async () => {
    const sandbox = createSandbox(nodeEval(''), nodeEval('setTimeout(() => undefined, 30_000)'), 1_000);

    await expect(sandbox.execute(directory)).resolves.toEqual({
      kind: 'timed-out',
      exitCode: 1,
      stdout: '',
      stderr: 'Script execution timed out after 1 seconds'
    });
  });
});
