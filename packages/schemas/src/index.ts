export {
  createProcessConfig,
  DEFAULT_UPSTREAM_API_VERSION,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  hasServiceAccount,
  ProcessConfigSchema,
  type ProcessConfig,
  type ProcessConfigInput
} from './config';
export {
  ClassifiedErrorSchema,
  proxyErrorKinds,
  ProxyErrorKindSchema,
  ProxyErrorPayloadSchema,
  upstreamRejectionReasons,
  upstreamUnreachableReasons,
  type ClassifiedError,
  type MissingCredentialsError,
  type ProxyErrorKind,
  type ProxyErrorPayload,
  type UnsupportedRouteError,
  type UpstreamRejectedError,
  type UpstreamRejectionReason,
  type UpstreamUnreachableError,
  type UpstreamUnreachableReason
} from './errors';
export {HealthReportSchema, type HealthReport} from './health';
export {LogEventSchema, LogLevelNameSchema, type LogEvent} from './logging';
export type {InboundRequest} from './request';
export {
  apiDialects,
  ApiDialectSchema,
  authModes,
  AuthModeSchema,
  endpointOperations,
  EndpointOperationSchema,
  forwardedOperations,
  type ApiDialect,
  type AuthMode,
  type EndpointOperation,
  type ForwardedOperation
} from './routing';
