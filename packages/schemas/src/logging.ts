import {z} from 'zod';

import {ApiDialectSchema, AuthModeSchema, EndpointOperationSchema} from './routing';

export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

/** One JSON line as written by the proxy's structured logger. */
export const LogEventSchema = z
  .object({
    ts: z.string().min(1),
    level: LogLevelNameSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1),
    request_id: z.string().min(1),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    operation: EndpointOperationSchema.optional(),
    dialect: ApiDialectSchema.optional(),
    auth_mode: AuthModeSchema.optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;
