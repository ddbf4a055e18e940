import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { LocalFileSystemArtifactStore } from '@scriptforge/artifact-store';
import { JobResultSchema } from '@scriptforge/core';
import type { JobLogger } from '@scriptforge/core/jobs';
import { loadHtmlFixture } from '@scriptforge/fixtures';

import { ScrapeJobService } from '../jobs/service.js';
import { createServer } from './server.js';

const SuccessSchema = z.object({
  status: z.literal('success'),
  downloadReference: z.string()
});

const DownloadsSchema = z.object({
  downloads: z.array(z.object({ filename: z.string(), size: z.number(), created: z.string(), runId: z.string() }))
});

const createLogger = (): JobLogger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe('createServer', () => {
  let directory: string;
  let server: ReturnType<typeof createServer>;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'scriptforge-http-'));
    const service = new ScrapeJobService({
      store: new LocalFileSystemArtifactStore({ directory }),
      logger: createLogger(),
      defaults: { model: 'gpt-test', credentials: ['first-test-key'], credentialRetryDelayMs: 0 },
      fetchDocument: async () => loadHtmlFixture('catalog-listing').html,
      createOracle: () => ({
        generate: async () => ({
          scriptText: 'console.log(JSON.stringify([{ name: "Swivel Block" }]));',
          dependencyManifestText: '{ "type": "module" }'
        })
      }),
      createSandbox: () => ({
        execute: async () => ({ kind: 'completed', exitCode: 0, stdout: '[{"name":"Swivel Block"}]', stderr: '' })
      })
    });
    server = createServer({ service });
  });

  afterEach(async () => {
    await server.close();
    await rm(directory, { recursive: true, force: true });
  });

  const scrape = async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/api/scrape',
      payload: { url: 'https://shop.example.com/catalog', prompt: 'product names' }
    });
    expect(response.statusCode).toBe(200);
    return SuccessSchema.parse(response.json());
  };

  it('reports health', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/health' });

    expect(response.json()).toEqual({ status: 'healthy', service: 'scriptforge' });
  });

  it('runs a job and returns its result', async () => {
    const result = await scrape();

    expect(result.downloadReference).toMatch(/^\/api\/download\/run_[0-9a-f]{32}$/);
  });

  it('rejects incomplete or non-http requests', async () => {
    const missingPrompt = await server.inject({
      method: 'POST',
      url: '/api/scrape',
      payload: { url: 'https://shop.example.com/catalog' }
    });
    const ftp = await server.inject({
      method: 'POST',
      url: '/api/scrape',
      payload: { url: 'ftp://shop.example.com/catalog', prompt: 'product names' }
    });

    expect(missingPrompt.statusCode).toBe(400);
    expect(missingPrompt.json()).toEqual({ error: 'Required' });
    expect(ftp.statusCode).toBe(400);
    expect(ftp.json()).toEqual({ error: 'URL must start with http:// or https://' });
  });

  it('streams progress as server-sent events ending in the result', async () => {
    const settings = encodeURIComponent(JSON.stringify({ apiKeys: ['request-test-key'] }));
    const response = await server.inject({
      method: 'GET',
      url: `/api/scrape?url=${encodeURIComponent('https://shop.example.com/catalog')}&prompt=products&settings=${settings}`
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/event-stream');

    const frames = response.body.split('\n\n').filter((frame) => frame.length > 0);
    expect(frames.every((frame) => frame.startsWith('data: '))).toBe(true);
    const events = frames.map((frame): unknown => JSON.parse(frame.slice('data: '.length)));

    expect(events[0]).toEqual({ log: expect.stringMatching(/^Starting scraping job with run_id: run_/) });
    expect(JobResultSchema.parse(events.at(-1)).status).toBe('success');
    expect(events.slice(0, -1).every((event) => z.object({ log: z.string() }).safeParse(event).success)).toBe(true);
  });

  it('rejects stream requests with malformed settings', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/api/scrape?url=https%3A%2F%2Fshop.example.com&prompt=products&settings=%7Bnot-json'
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'settings must be a JSON object' });
  });

  it('serves packaged scripts as zip downloads', async () => {
    const result = await scrape();
    const runId = result.downloadReference.replace('/api/download/', '');

    const response = await server.inject({ method: 'GET', url: result.downloadReference });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/zip');
    expect(response.headers['content-disposition']).toBe(`attachment; filename="scraper_${runId}.zip"`);
    expect(response.rawPayload.subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('validates run ids and reports missing downloads', async () => {
    const invalid = await server.inject({ method: 'GET', url: '/api/download/..%2Fsecrets' });
    const missing = await server.inject({
      method: 'GET',
      url: '/api/download/run_00000000000000000000000000000000'
    });

    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ error: 'Invalid run id' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'File not found' });
  });

  it('lists downloads', async () => {
    const result = await scrape();
    const runId = result.downloadReference.replace('/api/download/', '');

    const response = await server.inject({ method: 'GET', url: '/api/downloads' });
    const body = DownloadsSchema.parse(response.json());

    expect(body.downloads).toHaveLength(1);
    expect(body.downloads[0]).toMatchObject({ runId, filename: `scraper_${runId}.zip` });
    expect(body.downloads[0].size).toBeGreaterThan(0);
    expect(Number.isNaN(Date.parse(body.downloads[0].created))).toBe(false);
  });
});
