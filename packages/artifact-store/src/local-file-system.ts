import { createWriteStream } from 'node:fs';
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import archiver from 'archiver';

import { GeneratedArtifactSchema, type GeneratedArtifact } from '@scriptforge/core';
import { isJobId, type JobLogger } from '@scriptforge/core/jobs';

import type { ArtifactStore, DownloadEntry, PackagedArtifact, SweepReport } from './types.js';

export const SCRIPT_FILE_NAME = 'scraper.mjs';
export const MANIFEST_FILE_NAME = 'package.json';

const WORKSPACES_DIRECTORY = 'workspaces';
const DOWNLOADS_DIRECTORY = 'downloads';

const DEFAULT_MANIFEST = {
  name: 'generated-scraper',
  private: true,
  type: 'module'
} as const;

export const downloadFilenameFor = (jobId: string): string => `scraper_${jobId}.zip`;

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const assertJobId = (jobId: string): void => {
  if (!isJobId(jobId)) {
    throw new Error(`Invalid job id: ${jobId}`);
  }
};

export interface LocalFileSystemArtifactStoreOptions {
  readonly directory: string;
  readonly now?: () => Date;
  readonly logger?: JobLogger;
}

export class LocalFileSystemArtifactStore implements ArtifactStore {
  private readonly workspaces: string;
  private readonly downloads: string;
  private readonly now: () => Date;
  private readonly logger?: JobLogger;
  private readonly ready: Promise<void>;

  constructor(options: LocalFileSystemArtifactStoreOptions) {
    this.workspaces = join(options.directory, WORKSPACES_DIRECTORY);
    this.downloads = join(options.directory, DOWNLOADS_DIRECTORY);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
    this.ready = Promise.all([
      mkdir(this.workspaces, { recursive: true }),
      mkdir(this.downloads, { recursive: true })
    ]).then(() => undefined);
  }

  async createWorkspace(jobId: string): Promise<string> {
    assertJobId(jobId);
    await this.ready;
    const directory = join(this.workspaces, jobId);
    await mkdir(directory, { recursive: true });
    return directory;
  }

  async writeArtifact(jobId: string, artifact: GeneratedArtifact): Promise<string> {
    const directory = await this.createWorkspace(jobId);
    const parsed = GeneratedArtifactSchema.parse(artifact);
    const manifest =
      parsed.dependencyManifestText.trim().length > 0
        ? parsed.dependencyManifestText
        : `${JSON.stringify(DEFAULT_MANIFEST, null, 2)}\n`;

    await writeFile(join(directory, SCRIPT_FILE_NAME), parsed.scriptText, 'utf-8');
    await writeFile(join(directory, MANIFEST_FILE_NAME), manifest, 'utf-8');
    this.logger?.debug('Wrote generated artifact', { jobId, directory });
    return directory;
  }

  async packageArtifact(jobId: string): Promise<PackagedArtifact> {
    assertJobId(jobId);
    await this.ready;
    const workspace = join(this.workspaces, jobId);
    const path = join(this.downloads, `${jobId}.zip`);

    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(path);
      const archive = archiver('zip', { zlib: { level: 9 } });

      output.on('close', () => resolve());
      output.on('error', reject);
      archive.on('error', reject);
      archive.on('warning', (warning) => {
        this.logger?.warn('Archive warning', { jobId, warning: warning.message });
      });

      archive.pipe(output);
      archive.file(join(workspace, SCRIPT_FILE_NAME), { name: SCRIPT_FILE_NAME });
      archive.file(join(workspace, MANIFEST_FILE_NAME), { name: MANIFEST_FILE_NAME });
      archive.finalize().catch(reject);
    });

    const { size } = await stat(path);
    this.logger?.info('Packaged generated artifact', { jobId, path, size });
    return { jobId, path, filename: downloadFilenameFor(jobId), size };
  }

  async resolveDownload(jobId: string): Promise<DownloadEntry | undefined> {
    if (!isJobId(jobId)) {
      return undefined;
    }
    await this.ready;
    return this.readEntry(`${jobId}.zip`);
  }

  async listDownloads(): Promise<readonly DownloadEntry[]> {
    await this.ready;
    const entries = await readdir(this.downloads, { withFileTypes: true });
    const downloads: DownloadEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith('.zip')) {
        continue;
      }
      const download = await this.readEntry(entry.name);
      if (download) {
        downloads.push(download);
      }
    }

    return downloads.sort((a, b) => b.created.getTime() - a.created.getTime());
  }

  async sweep(maxAgeMs: number): Promise<SweepReport> {
    await this.ready;
    const cutoff = this.now().getTime() - maxAgeMs;
    const removedWorkspaces: string[] = [];
    const removedPackages: string[] = [];

    for (const entry of await readdir(this.workspaces, { withFileTypes: true })) {
      if (!entry.isDirectory()) {
        continue;
      }
      const path = join(this.workspaces, entry.name);
      if ((await stat(path)).mtimeMs < cutoff) {
        await rm(path, { recursive: true, force: true });
        removedWorkspaces.push(entry.name);
        this.logger?.info('Removed stale workspace', { name: entry.name });
      }
    }

    for (const entry of await readdir(this.downloads, { withFileTypes: true })) {
      if (!entry.isFile() || !entry.name.endsWith('.zip')) {
        continue;
      }
      const path = join(this.downloads, entry.name);
      if ((await stat(path)).mtimeMs < cutoff) {
        await rm(path, { force: true });
        removedPackages.push(entry.name);
        this.logger?.info('Removed stale package', { name: entry.name });
      }
    }

    return { removedWorkspaces, removedPackages };
  }

  private async readEntry(fileName: string): Promise<DownloadEntry | undefined> {
    const path = join(this.downloads, fileName);
    try {
      const stats = await stat(path);
      const runId = fileName.replace(/\.zip$/, '');
      return {
        runId,
        filename: downloadFilenameFor(runId),
        path,
        size: stats.size,
        created: stats.mtime
      };
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
  }
}
