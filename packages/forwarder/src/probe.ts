import type {HealthReport} from '@jira-relay/schemas';

import type {FetchLike, OutboundCall} from './contracts';
import {forwardUpstreamCall} from './forward';
import {isTimeoutError} from './normalize';

/**
 * Reachability probe behind the synthetic health route. A degraded upstream
 * is reported in the payload, never as a failure of the probe itself.
 */
export const probeUpstream = async ({
  call,
  timeoutMs,
  fetchImpl
}: {
  call: OutboundCall;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}): Promise<HealthReport> => {
  const outcome = await forwardUpstreamCall({call, timeoutMs, fetchImpl});

  if (outcome.ok) {
    if (outcome.value.statusCode >= 200 && outcome.value.statusCode <= 299) {
      return {status: 'ok', upstream: {reachable: true, status_code: outcome.value.statusCode}};
    }

    return {
      status: 'degraded',
      upstream: {reachable: false, reason: 'upstream_status_not_ok', status_code: outcome.value.statusCode}
    };
  }

  if (outcome.error.type === 'status') {
    return {
      status: 'degraded',
      upstream: {reachable: false, reason: 'upstream_status_not_ok', status_code: outcome.error.statusCode}
    };
  }

  return {
    status: 'degraded',
    upstream: {
      reachable: false,
      reason: isTimeoutError(outcome.error.error) ? 'upstream_timeout' : 'upstream_network_error'
    }
  };
};
