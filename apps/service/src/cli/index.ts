import { Command, InvalidArgumentError } from 'commander';

import type { ScrapeJobService } from '../jobs/service.js';

const parsePositiveInteger = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const parsePositiveNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

export interface ServeOptions {
  readonly port?: number;
}

export interface CreateCliOptions {
  readonly service: ScrapeJobService;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
  readonly serve?: (options: ServeOptions) => Promise<void>;
}

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const service = options.service;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program
    .name('scriptforge')
    .description('Generate and test web scraping scripts with a language model')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text)
    });

  program
    .command('generate')
    .description('Run a scraping job and print its result')
    .requiredOption('--url <url>', 'Page to scrape')
    .requiredOption('--objective <text>', 'What data to extract')
    .option('--api-key <keys...>', 'Model API keys, tried in order')
    .option('--model <id>', 'Model identifier')
    .option('--max-attempts <n>', 'Generation attempts before giving up', parsePositiveInteger)
    .action(
      handle(
        async (command: { url: string; objective: string; apiKey?: string[]; model?: string; maxAttempts?: number }) => {
          const outcome = await service.run(
            {
              url: command.url,
              prompt: command.objective,
              settings: { apiKeys: command.apiKey ?? [], model: command.model, maxAttempts: command.maxAttempts }
            },
            { onProgress: (line) => stderr.write(`${line}\n`) }
          );
          writeJson({ jobId: outcome.jobId, state: outcome.state, ...outcome.result });
        }
      )
    );

  program
    .command('downloads')
    .description('List packaged scripts, newest first')
    .action(
      handle(async () => {
        const downloads = await service.listDownloads();
        writeJson(
          downloads.map((entry) => ({
            runId: entry.runId,
            filename: entry.filename,
            size: entry.size,
            created: entry.created.toISOString(),
            path: entry.path
          }))
        );
      })
    );

  program
    .command('sweep')
    .description('Delete job workspaces and packages older than the retention window')
    .option('--max-age-hours <n>', 'Retention window in hours', parsePositiveNumber)
    .action(
      handle(async (command: { maxAgeHours?: number }) => {
        const maxAgeMs = command.maxAgeHours !== undefined ? command.maxAgeHours * 60 * 60 * 1_000 : undefined;
        writeJson(await service.sweep(maxAgeMs));
      })
    );

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--port <n>', 'Port to listen on', parsePositiveInteger)
    .action(
      handle(async (command: { port?: number }) => {
        if (!options.serve) {
          throw new Error('Serving is not available in this context.');
        }
        await options.serve({ port: command.port });
      })
    );

  return program;
};
