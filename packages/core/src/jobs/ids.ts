import { randomUUID } from 'node:crypto';

export const JOB_ID_PATTERN = /^run_[0-9a-f]{32}$/;

export const createJobId = (): string => `run_${randomUUID().replaceAll('-', '')}`;

export const isJobId = (value: string): boolean => JOB_ID_PATTERN.test(value);

export const downloadReferenceFor = (jobId: string): string => `/api/download/${jobId}`;
