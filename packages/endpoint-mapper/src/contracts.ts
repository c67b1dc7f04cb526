import type {ApiDialect, ForwardedOperation} from '@jira-relay/schemas'

export {
  apiDialects,
  forwardedOperations,
  type ApiDialect,
  type EndpointOperation,
  type ForwardedOperation
} from '@jira-relay/schemas'

export const DIALECT_PATH_PREFIXES: Readonly<Record<ApiDialect, string>> = {
  v2: '/rest/api/2/',
  latest: '/rest/api/latest/'
}

export type UpstreamMethod = 'GET' | 'PUT' | 'POST'

export type ForwardTarget = {
  kind: 'forward'
  operation: ForwardedOperation
  dialect: ApiDialect
  method: UpstreamMethod
  upstreamPath: string
  query: string
  body?: Buffer
}

export type HealthTarget = {
  kind: 'health'
  operation: 'health'
  dialect: ApiDialect
}

export type EndpointTarget = ForwardTarget | HealthTarget

export type MapEndpointInput = {
  method: string
  path: string
  query: string
  body?: Buffer
  apiVersion: string
}
