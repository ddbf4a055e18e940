import { createReadStream } from 'node:fs';

import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import { JobSettingsSchema, ScrapeRequestSchema } from '@scriptforge/core';
import { JOB_ID_PATTERN } from '@scriptforge/core/jobs';

import type { ScrapeJobService } from '../jobs/service.js';

export const SERVICE_NAME = 'scriptforge';

const SettingsQuerySchema = z
  .string()
  .optional()
  .transform((value, context): unknown => {
    if (value === undefined || value.trim().length === 0) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'settings must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(JobSettingsSchema);

const StreamQuerySchema = z.object({
  url: z.string(),
  prompt: z.string(),
  settings: SettingsQuerySchema
});

const DownloadParamsSchema = z.object({
  runId: z.string().regex(JOB_ID_PATTERN, 'Invalid run id')
});

export interface CreateServerOptions {
  readonly service: ScrapeJobService;
}

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const service = options.service;

  app.get('/api/health', async () => ({ status: 'healthy', service: SERVICE_NAME }));

  app.post('/api/scrape', async (request, reply) => {
    const body = ScrapeRequestSchema.parse(request.body ?? {});
    const outcome = await service.run(body);
    return reply.send(outcome.result);
  });

  app.get('/api/scrape', async (request, reply) => {
    const query = StreamQuerySchema.parse(request.query);
    const task = service.start({ url: query.url, prompt: query.prompt, settings: query.settings });

    reply.hijack();
    const raw = reply.raw;
    raw.writeHead(200, {
      'content-type': 'text/event-stream',
      'cache-control': 'no-cache',
      connection: 'keep-alive'
    });
    raw.on('close', () => {
      if (!raw.writableFinished) {
        task.cancel();
      }
    });

    for await (const event of task.events()) {
      if (raw.destroyed) {
        break;
      }
      raw.write(`data: ${JSON.stringify(event)}\n\n`);
    }
    raw.end();
  });

  app.get('/api/download/:runId', async (request, reply) => {
    const { runId } = DownloadParamsSchema.parse(request.params);
    const download = await service.resolveDownload(runId);
    if (!download) {
      return reply.status(404).send({ error: 'File not found' });
    }

    return reply
      .header('content-type', 'application/zip')
      .header('content-disposition', `attachment; filename="${download.filename}"`)
      .send(createReadStream(download.path));
  });

  app.get('/api/downloads', async (_request, reply) => {
    const downloads = await service.listDownloads();
    return reply.send({
      downloads: downloads.map((entry) => ({
        filename: entry.filename,
        size: entry.size,
        created: entry.created.toISOString(),
        runId: entry.runId
      }))
    });
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ error: error.issues.map((issue) => issue.message).join('; ') });
    }
    const statusCode = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
    return reply.status(statusCode).send({ error: error.message });
  });

  return app;
};
