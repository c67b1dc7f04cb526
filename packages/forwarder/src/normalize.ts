import type {
  ClassifiedError,
  UpstreamRejectedError,
  UpstreamRejectionReason,
  UpstreamUnreachableError
} from '@jira-relay/schemas';

import type {RawUpstreamFailure} from './contracts';

const TIMEOUT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

const readErrorName = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return undefined;
  }

  return typeof error.name === 'string' ? error.name : undefined;
};

export const isTimeoutError = (error: unknown) => {
  const name = readErrorName(error);
  return name !== undefined && TIMEOUT_ERROR_NAMES.has(name);
};

const classifyRejection = (statusCode: number): {reason: UpstreamRejectionReason; message: string} => {
  switch (statusCode) {
    case 400:
    case 422:
      return {reason: 'validation_failed', message: 'Invalid request to Jira API'};
    case 401:
      return {reason: 'authentication_failed', message: 'Jira authentication failed'};
    case 403:
      return {reason: 'permission_denied', message: 'Permission denied for Jira operation'};
    case 404:
      return {reason: 'not_found', message: 'Jira resource not found'};
    case 429:
      return {reason: 'rate_limited', message: 'Jira API rate limit exceeded'};
    default:
      return statusCode >= 500
        ? {reason: 'server_error', message: 'Jira server error'}
        : {reason: 'upstream_error', message: `Jira API error: ${statusCode}`};
  }
};

const parseDetails = (body: Buffer): {parsed: true; value: unknown} | {parsed: false} => {
  if (body.byteLength === 0) {
    return {parsed: false};
  }

  try {
    const value: unknown = JSON.parse(body.toString('utf8'));
    return {parsed: true, value};
  } catch {
    return {parsed: false};
  }
};

const toUnreachable = (error: unknown): UpstreamUnreachableError =>
  isTimeoutError(error)
    ? {kind: 'upstream_unreachable', reason: 'upstream_timeout', message: 'Request to Jira timed out'}
    : {kind: 'upstream_unreachable', reason: 'upstream_network_error', message: 'Unable to connect to Jira server'};

const toRejected = ({statusCode, body}: {statusCode: number; body: Buffer}): UpstreamRejectedError => {
  const {reason, message} = classifyRejection(statusCode);
  const details = parseDetails(body);

  return {
    kind: 'upstream_rejected',
    reason,
    status_code: statusCode,
    message,
    ...(details.parsed ? {details: details.value} : {})
  };
};

/**
 * Maps a raw transport failure onto the closed error taxonomy. Structured
 * upstream error bodies survive as `details`.
 */
export const normalizeUpstreamFailure = (
  failure: RawUpstreamFailure
): UpstreamUnreachableError | UpstreamRejectedError => {
  if (failure.type === 'exception') {
    return toUnreachable(failure.error);
  }

  return toRejected(failure);
};

export const toHttpStatus = (error: ClassifiedError): number => {
  switch (error.kind) {
    case 'missing_credentials':
      return 401;
    case 'unsupported_route':
      return 404;
    case 'upstream_unreachable':
      return 503;
    case 'upstream_rejected':
      return error.status_code;
  }
};
