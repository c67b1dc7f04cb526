import {z} from 'zod';

import type {UpstreamMethod} from '@jira-relay/endpoint-mapper';
import type {HeaderMap} from '@jira-relay/shared';

export const ForwarderTimeoutsSchema = z
  .object({
    total_timeout_ms: z.number().int().min(1).max(300_000).default(30_000)
  })
  .strict();

export type ForwarderTimeouts = z.infer<typeof ForwarderTimeoutsSchema>;

export const DEFAULT_FORWARDER_TIMEOUTS = ForwarderTimeoutsSchema.parse({});

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

/**
 * The fully composed upstream request. `sensitiveHeaderNames` travels with
 * the headers so every logger downstream can redact without knowing the
 * auth scheme.
 */
export type OutboundCall = {
  method: UpstreamMethod;
  url: string;
  headers: HeaderMap;
  sensitiveHeaderNames: ReadonlySet<string>;
  body?: Buffer;
};

export type UpstreamReply = {
  statusCode: number;
  body: Buffer;
  contentType?: string;
  // Only on 3xx replies; redirects are left for the client to follow.
  location?: string;
};

export type RawUpstreamFailure =
  | {
      type: 'exception';
      error: unknown;
    }
  | ({
      type: 'status';
    } & UpstreamReply);
