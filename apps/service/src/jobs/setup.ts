import { LocalFileSystemArtifactStore } from '@scriptforge/artifact-store';
import type { JobLogger } from '@scriptforge/core/jobs';

import { toJobDefaults, type ServiceConfig } from '../config.js';
import { ScrapeJobService } from './service.js';

export interface CreateScrapeJobServiceOptions {
  readonly config: ServiceConfig;
  readonly logger: JobLogger;
}

export const createScrapeJobService = (options: CreateScrapeJobServiceOptions): ScrapeJobService => {
  const store = new LocalFileSystemArtifactStore({ directory: options.config.workDirectory, logger: options.logger });
  return new ScrapeJobService({ store, logger: options.logger, defaults: toJobDefaults(options.config) });
};
