export {
  apiDialects,
  DIALECT_PATH_PREFIXES,
  forwardedOperations,
  type ApiDialect,
  type EndpointOperation,
  type EndpointTarget,
  type ForwardedOperation,
  type ForwardTarget,
  type HealthTarget,
  type MapEndpointInput,
  type UpstreamMethod
} from './contracts'
export {mapEndpoint, upstreamPathFor} from './mapper'
