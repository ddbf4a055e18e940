import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');

export const HttpUrlSchema = z
  .string()
  .trim()
  .url({ message: 'URL must be absolute' })
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must start with http:// or https://'
  });

/**
 * Per-request settings supplied by a caller. Every field is optional so that a
 * front end can submit only the credentials it holds.
 */
export const JobSettingsSchema = z.object({
  apiKeys: z.array(nonEmptyString).default([]),
  model: nonEmptyString.optional(),
  // Seconds allowed for the generated script to run.
  timeout: z.number().int().positive().max(3_600).optional(),
  maxAttempts: z.number().int().min(1).max(10).optional()
});

export type JobSettings = z.infer<typeof JobSettingsSchema>;

export const ScrapeRequestSchema = z.object({
  url: HttpUrlSchema,
  prompt: nonEmptyString,
  settings: JobSettingsSchema.default({})
});

export type ScrapeRequest = z.infer<typeof ScrapeRequestSchema>;

export const JobTimeoutsSchema = z
  .object({
    fetchMs: z.number().int().positive().default(30_000),
    oracleMs: z.number().int().positive().default(180_000),
    installMs: z.number().int().positive().default(120_000),
    runMs: z.number().int().positive().default(60_000)
  })
  .strict();

export type JobTimeouts = z.infer<typeof JobTimeoutsSchema>;

export const JobConfigurationSchema = z
  .object({
    model: nonEmptyString,
    credentials: z.array(nonEmptyString).readonly(),
    maxAttempts: z.number().int().min(1).default(5),
    timeouts: JobTimeoutsSchema.default({}),
    credentialRetryDelayMs: z.number().int().min(0).default(6_000),
    minimumCountRatio: z.number().min(0).max(1).default(0.5),
    maxArtifactAgeMs: z.number().int().positive().default(24 * 60 * 60 * 1_000)
  })
  .strict();

export type JobConfiguration = z.infer<typeof JobConfigurationSchema>;
export type JobConfigurationInput = z.input<typeof JobConfigurationSchema>;

export const GeneratedArtifactSchema = z.object({
  scriptText: z.string().refine((value) => value.trim().length > 0, {
    message: 'scriptText must not be empty'
  }),
  dependencyManifestText: z.string()
});

export type GeneratedArtifact = z.infer<typeof GeneratedArtifactSchema>;

export const ExecutionResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('completed'),
    exitCode: z.number().int(),
    stdout: z.string(),
    stderr: z.string()
  }),
  z.object({
    kind: z.literal('install-failed'),
    exitCode: z.number().int(),
    stdout: z.string(),
    stderr: z.string()
  }),
  z.object({
    kind: z.literal('timed-out'),
    exitCode: z.number().int(),
    stdout: z.string(),
    stderr: z.string()
  })
]);

export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;
export type ExecutionResultKind = ExecutionResult['kind'];

export interface ValidationVerdict {
  readonly valid: boolean;
  readonly feedback: string;
}

export const JobResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    message: z.string(),
    preview: z.string(),
    downloadReference: z.string()
  }),
  z.object({
    status: z.literal('action_required'),
    message: z.string(),
    downloadReference: z.string()
  }),
  z.object({
    status: z.literal('error'),
    message: z.string(),
    diagnosticDetail: z.string().optional()
  })
]);

export type JobResult = z.infer<typeof JobResultSchema>;
export type JobResultStatus = JobResult['status'];
