import type { GeneratedArtifact } from '@scriptforge/core';

export interface PackagedArtifact {
  readonly jobId: string;
  readonly path: string;
  readonly filename: string;
  readonly size: number;
}

export interface DownloadEntry {
  readonly runId: string;
  readonly filename: string;
  readonly path: string;
  readonly size: number;
  readonly created: Date;
}

export interface SweepReport {
  readonly removedWorkspaces: readonly string[];
  readonly removedPackages: readonly string[];
}

export interface ArtifactStore {
  /** Creates (or reuses) the working directory for a job and returns its path. */
  createWorkspace(jobId: string): Promise<string>;
  writeArtifact(jobId: string, artifact: GeneratedArtifact): Promise<string>;
  packageArtifact(jobId: string): Promise<PackagedArtifact>;
  resolveDownload(jobId: string): Promise<DownloadEntry | undefined>;
  listDownloads(): Promise<readonly DownloadEntry[]>;
  sweep(maxAgeMs: number): Promise<SweepReport>;
}
