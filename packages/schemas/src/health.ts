import {z} from 'zod';

import {upstreamUnreachableReasons} from './errors';

export const HealthReportSchema = z.discriminatedUnion('status', [
  z
    .object({
      status: z.literal('ok'),
      upstream: z
        .object({
          reachable: z.literal(true),
          status_code: z.number().int()
        })
        .strict()
    })
    .strict(),
  z
    .object({
      status: z.literal('degraded'),
      upstream: z
        .object({
          reachable: z.literal(false),
          reason: z.union([z.enum(upstreamUnreachableReasons), z.literal('upstream_status_not_ok')]),
          status_code: z.number().int().optional()
        })
        .strict()
    })
    .strict()
]);

export type HealthReport = z.infer<typeof HealthReportSchema>;
