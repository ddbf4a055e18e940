export { startJobTask } from './job-task.js';
export type { JobTask, StartJobTaskOptions } from './job-task.js';
export { DEFAULT_PROGRESS_CAPACITY, ProgressChannel } from './progress-channel.js';
export type { ProgressChannelOptions } from './progress-channel.js';
export {
  createMastraOracle,
  createSpawnSandbox,
  resolveJobConfiguration,
  ScrapeJobService
} from './service.js';
export type {
  OracleFactory,
  RunJobOptions,
  SandboxFactory,
  ScrapeJobServiceOptions,
  ScrapeRequestInput
} from './service.js';
export { createScrapeJobService } from './setup.js';
