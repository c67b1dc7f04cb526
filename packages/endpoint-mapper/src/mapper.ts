import type {UnsupportedRouteError} from '@jira-relay/schemas'
import {err, ok, type Result} from '@jira-relay/shared'

import {
  apiDialects,
  DIALECT_PATH_PREFIXES,
  type ApiDialect,
  type EndpointTarget,
  type MapEndpointInput
} from './contracts'
import {ENDPOINT_DEFINITIONS} from './routes'

type DialectSplit = {
  dialect: ApiDialect
  suffix: string
}

const unsupportedRoute = ({method, path}: {method: string; path: string}): UnsupportedRouteError => ({
  kind: 'unsupported_route',
  message: `Unsupported route ${method} ${path}`,
  method,
  path
})

const splitDialect = (path: string): DialectSplit | null => {
  for (const dialect of apiDialects) {
    const prefix = DIALECT_PATH_PREFIXES[dialect]
    if (path.startsWith(prefix)) {
      const suffix = path.slice(prefix.length)
      return {dialect, suffix: suffix.endsWith('/') ? suffix.slice(0, -1) : suffix}
    }
  }

  return null
}

const decodeKeys = (segments: string[]): string[] | null => {
  const decoded: string[] = []
  for (const segment of segments) {
    try {
      decoded.push(decodeURIComponent(segment))
    } catch {
      return null
    }
  }

  return decoded
}

export const upstreamPathFor = ({apiVersion, suffix}: {apiVersion: string; suffix: string}) =>
  `/rest/api/${apiVersion}/${suffix}`

/**
 * Maps an inbound REST call onto the single upstream call it stands for.
 * Both dialects resolve to the same upstream path; only `dialect` differs.
 */
export const mapEndpoint = (input: MapEndpointInput): Result<EndpointTarget, UnsupportedRouteError> => {
  const method = input.method.toUpperCase()
  const split = splitDialect(input.path)
  if (!split) {
    return err(unsupportedRoute({method, path: input.path}))
  }

  for (const definition of ENDPOINT_DEFINITIONS) {
    if (definition.method !== method) {
      continue
    }

    const match = definition.pattern.exec(split.suffix)
    if (!match) {
      continue
    }

    if (definition.operation === 'health') {
      return ok({kind: 'health', operation: 'health', dialect: split.dialect})
    }

    const keys = decodeKeys(match.slice(1))
    if (!keys) {
      return err(unsupportedRoute({method, path: input.path}))
    }

    const body = definition.forwardsBody && input.body && input.body.byteLength > 0 ? input.body : undefined

    return ok({
      kind: 'forward',
      operation: definition.operation,
      dialect: split.dialect,
      method: definition.method,
      upstreamPath: upstreamPathFor({apiVersion: input.apiVersion, suffix: definition.toUpstreamSuffix(keys)}),
      query: input.query,
      ...(body ? {body} : {})
    })
  }

  return err(unsupportedRoute({method, path: input.path}))
}
