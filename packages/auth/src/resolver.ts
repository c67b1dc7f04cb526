import {hasServiceAccount, type MissingCredentialsError, type ProcessConfig} from '@jira-relay/schemas';
import {err, ok, type Result} from '@jira-relay/shared';

import {parseAuthorizationHeader} from './credentials';
import type {AuthDecision} from './types';

const missingCredentials = (message: string): MissingCredentialsError => ({
  kind: 'missing_credentials',
  message
});

/**
 * Decides which credentials are presented upstream for one request.
 *
 * With a service account configured the inbound header only contributes the
 * Basic username, which becomes the impersonated user; its secret is never
 * used. Without one, the inbound credentials are forwarded as they are.
 */
export const resolveAuthDecision = ({
  config,
  authorizationHeader
}: {
  config: ProcessConfig;
  authorizationHeader: string | undefined;
}): Result<AuthDecision, MissingCredentialsError> => {
  const parsedCredentials = parseAuthorizationHeader(authorizationHeader);

  if (hasServiceAccount(config)) {
    if (parsedCredentials.ok && parsedCredentials.value.scheme === 'basic') {
      return ok({
        mode: 'service_account_impersonation',
        serviceUsername: config.serviceUsername,
        serviceSecret: config.serviceApiToken,
        impersonatedUser: parsedCredentials.value.username
      });
    }

    return ok({
      mode: 'service_account',
      serviceUsername: config.serviceUsername,
      serviceSecret: config.serviceApiToken
    });
  }

  if (!parsedCredentials.ok) {
    return err(
      missingCredentials(
        parsedCredentials.error === 'authorization_missing'
          ? 'Authorization header is required'
          : 'Authorization header must carry Basic or Bearer credentials'
      )
    );
  }

  return ok({mode: 'per_request', credentials: parsedCredentials.value});
};
