import type {HeaderMap} from '@jira-relay/shared';

export type BasicCredentials = {
  scheme: 'basic';
  username: string;
  secret: string;
};

export type BearerCredentials = {
  scheme: 'bearer';
  token: string;
};

export type InboundCredentials = BasicCredentials | BearerCredentials;

export type PerRequestDecision = {
  mode: 'per_request';
  credentials: InboundCredentials;
};

export type ServiceAccountDecision = {
  mode: 'service_account';
  serviceUsername: string;
  serviceSecret: string;
};

export type ServiceAccountImpersonationDecision = {
  mode: 'service_account_impersonation';
  serviceUsername: string;
  serviceSecret: string;
  impersonatedUser: string;
};

export type AuthDecision = PerRequestDecision | ServiceAccountDecision | ServiceAccountImpersonationDecision;

export type AuthMode = AuthDecision['mode'];

export type ComposedHeaders = {
  headers: HeaderMap;
  sensitiveHeaderNames: ReadonlySet<string>;
};
