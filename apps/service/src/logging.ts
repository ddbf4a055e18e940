import { PinoLogger } from '@mastra/loggers';

import type { ServiceLogLevel } from './config.js';

export const createServiceLogger = (level: ServiceLogLevel = 'info'): PinoLogger =>
  new PinoLogger({
    name: 'Scriptforge',
    level
  });
