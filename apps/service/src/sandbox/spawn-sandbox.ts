import { spawn } from 'node:child_process';

import type { ExecutionResult } from '@scriptforge/core';
import type { JobLogger } from '@scriptforge/core/jobs';

import type { ExecutionSandbox } from './types.js';

export interface SandboxCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface SpawnExecutionSandboxOptions {
  readonly installTimeoutMs: number;
  readonly runTimeoutMs: number;
  readonly logger: JobLogger;
  readonly install?: SandboxCommand;
  readonly run?: SandboxCommand;
  readonly env?: NodeJS.ProcessEnv;
}

interface ProcessOutcome {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

export const DEFAULT_INSTALL_COMMAND: SandboxCommand = {
  command: process.platform === 'win32' ? 'npm.cmd' : 'npm',
  args: ['install', '--no-audit', '--no-fund']
};

export const DEFAULT_RUN_COMMAND: SandboxCommand = {
  command: process.execPath,
  args: ['scraper.mjs']
};

const toSeconds = (ms: number): number => Math.round(ms / 1_000);

const runProcess = (
  invocation: SandboxCommand,
  options: { cwd: string; timeoutMs: number; env: NodeJS.ProcessEnv }
): Promise<ProcessOutcome> =>
  new Promise<ProcessOutcome>((resolve) => {
    const child = spawn(invocation.command, [...invocation.args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.on('error', (error) => {
      clearTimeout(timer);
      resolve({ exitCode: 1, stdout, stderr: stderr.length > 0 ? `${stderr}\n${error.message}` : error.message, timedOut });
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({ exitCode: code ?? 1, stdout, stderr, timedOut });
    });
  });

/**
 * Runs generated scripts as child processes: dependency install first, then
 * the script itself, each killed when its own timeout elapses.
 */
export class SpawnExecutionSandbox implements ExecutionSandbox {
  private readonly installTimeoutMs: number;
  private readonly runTimeoutMs: number;
  private readonly logger: JobLogger;
  private readonly install: SandboxCommand;
  private readonly run: SandboxCommand;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: SpawnExecutionSandboxOptions) {
    this.installTimeoutMs = options.installTimeoutMs;
    this.runTimeoutMs = options.runTimeoutMs;
    this.logger = options.logger;
    this.install = options.install ?? DEFAULT_INSTALL_COMMAND;
    this.run = options.run ?? DEFAULT_RUN_COMMAND;
    this.env = options.env ?? process.env;
  }

  async execute(workingDirectory: string): Promise<ExecutionResult> {
    this.logger.info('Installing script dependencies', { workingDirectory });
    const installed = await runProcess(this.install, {
      cwd: workingDirectory,
      timeoutMs: this.installTimeoutMs,
      env: this.env
    });
    this.logger.debug('Dependency install finished', {
      exitCode: installed.exitCode,
      stdout: installed.stdout,
      stderr: installed.stderr
    });

    if (installed.timedOut) {
      return {
        kind: 'install-failed',
        exitCode: 1,
        stdout: installed.stdout,
        stderr: `Dependency installation timed out after ${toSeconds(this.installTimeoutMs)} seconds`
      };
    }
    if (installed.exitCode !== 0) {
      return {
        kind: 'install-failed',
        exitCode: installed.exitCode,
        stdout: installed.stdout,
        stderr: installed.stderr
      };
    }

    this.logger.info('Executing generated script', { workingDirectory });
    const executed = await runProcess(this.run, {
      cwd: workingDirectory,
      timeoutMs: this.runTimeoutMs,
      env: this.env
    });
    this.logger.debug('Script run finished', {
      exitCode: executed.exitCode,
      stdoutPreview: executed.stdout.slice(0, 500),
      stderr: executed.stderr
    });

    if (executed.timedOut) {
      return {
        kind: 'timed-out',
        exitCode: 1,
        stdout: '',
        stderr: `Script execution timed out after ${toSeconds(this.runTimeoutMs)} seconds`
      };
    }

    return {
      kind: 'completed',
      exitCode: executed.exitCode,
      stdout: executed.stdout,
      stderr: executed.stderr
    };
  }
}
