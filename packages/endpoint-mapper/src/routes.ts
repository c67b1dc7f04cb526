import type {EndpointOperation, UpstreamMethod} from './contracts'

export type EndpointDefinition = {
  operation: EndpointOperation
  method: UpstreamMethod
  pattern: RegExp
  forwardsBody: boolean
  toUpstreamSuffix: (keys: string[]) => string
}

const fixed = (suffix: string) => () => suffix

const withKey = (build: (key: string) => string) => (keys: string[]) => build(encodeURIComponent(keys[0] ?? ''))

// Suffixes are relative to the dialect prefix, without leading or trailing slash.
export const ENDPOINT_DEFINITIONS: readonly EndpointDefinition[] = [
  {operation: 'server_info', method: 'GET', pattern: /^serverInfo$/u, forwardsBody: false, toUpstreamSuffix: fixed('serverInfo')},
  {operation: 'search', method: 'GET', pattern: /^search$/u, forwardsBody: false, toUpstreamSuffix: fixed('search')},
  {
    operation: 'search_jql',
    method: 'GET',
    pattern: /^search\/jql$/u,
    forwardsBody: false,
    toUpstreamSuffix: fixed('search/jql')
  },
  {operation: 'issue_create', method: 'POST', pattern: /^issue$/u, forwardsBody: true, toUpstreamSuffix: fixed('issue')},
  {
    operation: 'issue_get',
    method: 'GET',
    pattern: /^issue\/([^/]+)$/u,
    forwardsBody: false,
    toUpstreamSuffix: withKey(key => `issue/${key}`)
  },
  {
    operation: 'issue_update',
    method: 'PUT',
    pattern: /^issue\/([^/]+)$/u,
    forwardsBody: true,
    toUpstreamSuffix: withKey(key => `issue/${key}`)
  },
  {
    operation: 'transitions_list',
    method: 'GET',
    pattern: /^issue\/([^/]+)\/transitions$/u,
    forwardsBody: false,
    toUpstreamSuffix: withKey(key => `issue/${key}/transitions`)
  },
  {
    operation: 'transition_execute',
    method: 'POST',
    pattern: /^issue\/([^/]+)\/transitions$/u,
    forwardsBody: true,
    toUpstreamSuffix: withKey(key => `issue/${key}/transitions`)
  },
  {operation: 'project_list', method: 'GET', pattern: /^project$/u, forwardsBody: false, toUpstreamSuffix: fixed('project')},
  {
    operation: 'project_get',
    method: 'GET',
    pattern: /^project\/([^/]+)$/u,
    forwardsBody: false,
    toUpstreamSuffix: withKey(key => `project/${key}`)
  },
  {operation: 'health', method: 'GET', pattern: /^health$/u, forwardsBody: false, toUpstreamSuffix: fixed('serverInfo')}
]
