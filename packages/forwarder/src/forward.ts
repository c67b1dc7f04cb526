import type {ComposedHeaders} from '@jira-relay/auth';
import type {ForwardTarget} from '@jira-relay/endpoint-mapper';
import {err, ok, type Result} from '@jira-relay/shared';

import {
  DEFAULT_FORWARDER_TIMEOUTS,
  ForwarderTimeoutsSchema,
  type FetchLike,
  type OutboundCall,
  type RawUpstreamFailure,
  type UpstreamReply
} from './contracts';
import {readContentType, readRedirectLocation, toHeadersObject} from './headers';

export type ForwardOutcome = Result<UpstreamReply, RawUpstreamFailure>;

export const buildUpstreamUrl = ({
  baseUrl,
  upstreamPath,
  query
}: {
  baseUrl: string;
  upstreamPath: string;
  query: string;
}) => (query.length > 0 ? `${baseUrl}${upstreamPath}?${query}` : `${baseUrl}${upstreamPath}`);

export const buildOutboundCall = ({
  target,
  baseUrl,
  composed
}: {
  target: ForwardTarget;
  baseUrl: string;
  composed: ComposedHeaders;
}): OutboundCall => ({
  method: target.method,
  url: buildUpstreamUrl({baseUrl, upstreamPath: target.upstreamPath, query: target.query}),
  headers: composed.headers.clone(),
  sensitiveHeaderNames: composed.sensitiveHeaderNames,
  ...(target.body ? {body: target.body} : {})
});

/**
 * Executes exactly one upstream attempt. The timeout signal stays attached
 * while the body is read, so a stalled body aborts like a stalled head.
 * Redirects are returned as-is rather than followed.
 */
export const forwardUpstreamCall = async ({
  call,
  timeoutMs = DEFAULT_FORWARDER_TIMEOUTS.total_timeout_ms,
  fetchImpl
}: {
  call: OutboundCall;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}): Promise<ForwardOutcome> => {
  const timeouts = ForwarderTimeoutsSchema.parse({total_timeout_ms: timeoutMs});
  const requestFetch = fetchImpl ?? globalThis.fetch;

  let upstreamResponse: Response;
  try {
    upstreamResponse = await requestFetch(call.url, {
      method: call.method,
      headers: toHeadersObject(call.headers),
      body: call.body,
      redirect: 'manual',
      signal: AbortSignal.timeout(timeouts.total_timeout_ms)
    });
  } catch (error) {
    return err({type: 'exception', error});
  }

  let body: Buffer;
  try {
    body = Buffer.from(await upstreamResponse.arrayBuffer());
  } catch (error) {
    return err({type: 'exception', error});
  }

  const contentType = readContentType(upstreamResponse);
  const location = readRedirectLocation(upstreamResponse);
  const reply: UpstreamReply = {
    statusCode: upstreamResponse.status,
    body,
    ...(contentType ? {contentType} : {}),
    ...(location ? {location} : {})
  };

  if (upstreamResponse.status >= 400) {
    return err({type: 'status', ...reply});
  }

  return ok(reply);
};
