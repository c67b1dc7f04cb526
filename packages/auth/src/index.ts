export {
  AUTHORIZATION_HEADER,
  composeHeaders,
  IMPERSONATION_HEADER,
  toLoggableHeaders
} from './composer';
export {
  decodeBasicCredentials,
  encodeBasicCredentials,
  parseAuthorizationHeader,
  type CredentialParseFailure
} from './credentials';
export {resolveAuthDecision} from './resolver';
export type {
  AuthDecision,
  AuthMode,
  BasicCredentials,
  BearerCredentials,
  ComposedHeaders,
  InboundCredentials,
  PerRequestDecision,
  ServiceAccountDecision,
  ServiceAccountImpersonationDecision
} from './types';
