import {z} from 'zod';

export const proxyErrorKinds = [
  'missing_credentials',
  'unsupported_route',
  'upstream_unreachable',
  'upstream_rejected'
] as const;

export const ProxyErrorKindSchema = z.enum(proxyErrorKinds);
export type ProxyErrorKind = z.infer<typeof ProxyErrorKindSchema>;

export const upstreamUnreachableReasons = ['upstream_timeout', 'upstream_network_error'] as const;
export type UpstreamUnreachableReason = (typeof upstreamUnreachableReasons)[number];

export const upstreamRejectionReasons = [
  'authentication_failed',
  'permission_denied',
  'not_found',
  'validation_failed',
  'rate_limited',
  'server_error',
  'upstream_error'
] as const;
export type UpstreamRejectionReason = (typeof upstreamRejectionReasons)[number];

export const ClassifiedErrorSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('missing_credentials'),
      message: z.string().min(1)
    })
    .strict(),
  z
    .object({
      kind: z.literal('unsupported_route'),
      message: z.string().min(1),
      method: z.string().min(1),
      path: z.string()
    })
    .strict(),
  z
    .object({
      kind: z.literal('upstream_unreachable'),
      reason: z.enum(upstreamUnreachableReasons),
      message: z.string().min(1)
    })
    .strict(),
  z
    .object({
      kind: z.literal('upstream_rejected'),
      reason: z.enum(upstreamRejectionReasons),
      status_code: z.number().int().gte(400).lte(599),
      message: z.string().min(1),
      details: z.unknown().optional()
    })
    .strict()
]);

export type ClassifiedError = z.infer<typeof ClassifiedErrorSchema>;
export type MissingCredentialsError = Extract<ClassifiedError, {kind: 'missing_credentials'}>;
export type UnsupportedRouteError = Extract<ClassifiedError, {kind: 'unsupported_route'}>;
export type UpstreamUnreachableError = Extract<ClassifiedError, {kind: 'upstream_unreachable'}>;
export type UpstreamRejectedError = Extract<ClassifiedError, {kind: 'upstream_rejected'}>;

export const ProxyErrorPayloadSchema = z
  .object({
    kind: z.string().min(1),
    message: z.string().min(1),
    correlation_id: z.string().min(1),
    upstream_status: z.number().int().optional(),
    details: z.unknown().optional()
  })
  .strict();

export type ProxyErrorPayload = z.infer<typeof ProxyErrorPayloadSchema>;
