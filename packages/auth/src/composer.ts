import {HeaderMap} from '@jira-relay/shared';

import {encodeBasicCredentials} from './credentials';
import type {AuthDecision, ComposedHeaders} from './types';

export const AUTHORIZATION_HEADER = 'authorization';
export const IMPERSONATION_HEADER = 'x-atlassian-user';

const SENSITIVE_HEADER_NAMES: ReadonlySet<string> = new Set([AUTHORIZATION_HEADER]);
const REDACTED_VALUE = '[REDACTED]';

const toAuthorizationValue = (decision: AuthDecision) => {
  switch (decision.mode) {
    case 'per_request':
      return decision.credentials.scheme === 'basic'
        ? `Basic ${encodeBasicCredentials(decision.credentials)}`
        : `Bearer ${decision.credentials.token}`;
    case 'service_account':
    case 'service_account_impersonation':
      return `Basic ${encodeBasicCredentials({
        username: decision.serviceUsername,
        secret: decision.serviceSecret
      })}`;
  }
};

export const composeHeaders = (decision: AuthDecision): ComposedHeaders => {
  const headers = new HeaderMap()
    .set(AUTHORIZATION_HEADER, toAuthorizationValue(decision))
    .set('accept', 'application/json')
    .set('content-type', 'application/json');

  if (decision.mode === 'service_account_impersonation') {
    headers.set(IMPERSONATION_HEADER, decision.impersonatedUser);
  }

  return {headers, sensitiveHeaderNames: SENSITIVE_HEADER_NAMES};
};

export const toLoggableHeaders = ({headers, sensitiveHeaderNames}: ComposedHeaders): Record<string, string> =>
  Object.fromEntries(
    Array.from(headers.entries(), ([name, value]) => [name, sensitiveHeaderNames.has(name) ? REDACTED_VALUE : value])
  );
