import {z} from 'zod';

const NonEmptyStringSchema = z.string().trim().min(1);

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;
export const DEFAULT_UPSTREAM_API_VERSION = '2';

export const ProcessConfigSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .transform(value => value.replace(/\/+$/u, '')),
    serviceUsername: NonEmptyStringSchema.optional(),
    serviceApiToken: NonEmptyStringSchema.optional(),
    timeoutMs: z.number().int().min(1).max(300_000).default(DEFAULT_UPSTREAM_TIMEOUT_MS),
    apiVersion: z
      .string()
      .regex(/^(?:\d+|latest)$/u)
      .default(DEFAULT_UPSTREAM_API_VERSION)
  })
  .strict();

export type ProcessConfigInput = z.input<typeof ProcessConfigSchema>;
export type ProcessConfig = Readonly<z.output<typeof ProcessConfigSchema>>;

/**
 * Parses and freezes the process-wide upstream configuration. The returned
 * object is shared by every request and is never mutated after startup.
 */
export const createProcessConfig = (input: ProcessConfigInput): ProcessConfig =>
  Object.freeze(ProcessConfigSchema.parse(input));

export const hasServiceAccount = (
  config: ProcessConfig
): config is ProcessConfig & {serviceUsername: string; serviceApiToken: string} =>
  Boolean(config.serviceUsername) && Boolean(config.serviceApiToken);
