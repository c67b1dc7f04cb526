import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {toHttpStatus, type FetchLike} from '@jira-relay/forwarder'
import {formatBodyForLog, runWithLogContext, setLogContextFields, type StructuredLogger} from '@jira-relay/logging'
import type {InboundRequest} from '@jira-relay/schemas'
import {HeaderMap} from '@jira-relay/shared'

import type {ServiceConfig} from '../config'
import {internal, isAppError} from '../errors'
import {extractCorrelationId, readBodyBuffer, sendError, sendJson, sendRaw} from '../http'
import {relayInboundRequest, type RelayOutcome} from '../relay'

export type ProxyRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

const HEALTH_ROUTE_SUFFIX = '/health'

const getRawRequestUrl = (request: IncomingMessage) => {
  if ('originalUrl' in request && typeof request.originalUrl === 'string' && request.originalUrl.length > 0) {
    return request.originalUrl
  }

  return request.url ?? '/'
}

export const splitRequestTarget = (rawUrl: string) => {
  const withoutFragment = rawUrl.split('#', 1)[0] ?? ''
  const queryIndex = withoutFragment.indexOf('?')
  if (queryIndex === -1) {
    return {path: withoutFragment.length > 0 ? withoutFragment : '/', query: ''}
  }

  const path = withoutFragment.slice(0, queryIndex)
  return {
    path: path.length > 0 ? path : '/',
    query: withoutFragment.slice(queryIndex + 1)
  }
}

const formatProcessTime = (durationMs: number) => (durationMs / 1000).toFixed(3)

const isHealthRoute = (path: string) => path.endsWith(HEALTH_ROUTE_SUFFIX)

export const createProxyRequestHandler = ({
  config,
  logger,
  fetchImpl,
  now = () => new Date()
}: {
  config: ServiceConfig
  logger: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => Date
}): ProxyRequestHandler => {
  const render = ({
    outcome,
    response,
    correlationId,
    headers
  }: {
    outcome: RelayOutcome
    response: ServerResponse
    correlationId: string
    headers: Record<string, string>
  }) => {
    switch (outcome.type) {
      case 'upstream':
        sendRaw({
          response,
          status: outcome.reply.statusCode,
          body: outcome.reply.body,
          ...(outcome.reply.contentType ? {contentType: outcome.reply.contentType} : {}),
          ...(outcome.reply.location ? {location: outcome.reply.location} : {}),
          correlationId,
          headers
        })
        return
      case 'health':
        sendJson({response, status: 200, correlationId, payload: outcome.report, headers})
        return
      case 'error': {
        const {error} = outcome
        sendError({
          response,
          status: toHttpStatus(error),
          kind: error.kind,
          message: error.message,
          correlationId,
          ...(error.kind === 'upstream_rejected' ? {upstreamStatus: error.status_code} : {}),
          ...(error.kind === 'upstream_rejected' && error.details !== undefined ? {details: error.details} : {}),
          headers
        })
        return
      }
    }
  }

  return (request, response) => {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const startedAtMs = now().getTime()
    const method = (request.method ?? 'GET').toUpperCase()
    const {path, query} = splitRequestTarget(getRawRequestUrl(request))

    const timingHeaders = () => ({
      'x-request-id': requestId,
      'x-process-time': formatProcessTime(Math.max(0, now().getTime() - startedAtMs))
    })

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        method
      },
      async () => {
        let reasonCode: string | undefined
        setLogContextFields({route: path})

        logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route: path,
          method
        })

        try {
          const body = await readBodyBuffer({request, maxBodyBytes: config.maxBodyBytes})

          if (method === 'GET' && path === '/') {
            sendJson({
              response,
              status: 200,
              correlationId,
              payload: {message: config.app.title, version: config.app.version},
              headers: timingHeaders()
            })
            return
          }

          const headers = HeaderMap.from(request.headers)
          if (logger.isLevelEnabled('debug') && !isHealthRoute(path)) {
            const formattedBody = formatBodyForLog({body, extraSensitiveKeys: config.logging.redactExtraKeys})
            logger.debug({
              event: 'request.details',
              component: 'http.server',
              message: `${method} ${path}`,
              metadata: {
                query,
                headers: headers.toRecord(),
                ...(formattedBody ? {body: formattedBody} : {})
              }
            })
          }

          const inbound: InboundRequest = {
            method,
            path,
            query,
            headers,
            ...(body.byteLength > 0 ? {body} : {})
          }

          const outcome = await relayInboundRequest({
            request: inbound,
            upstream: config.upstream,
            logger,
            ...(fetchImpl ? {fetchImpl} : {})
          })

          if (outcome.type === 'error') {
            reasonCode = outcome.error.kind
          }

          if (outcome.type === 'upstream' && logger.isLevelEnabled('debug') && !isHealthRoute(path)) {
            const formattedBody = formatBodyForLog({
              body: outcome.reply.body,
              extraSensitiveKeys: config.logging.redactExtraKeys
            })
            logger.debug({
              event: 'response.details',
              component: 'http.server',
              message: `Responding with upstream status ${outcome.reply.statusCode}`,
              status_code: outcome.reply.statusCode,
              ...(formattedBody ? {metadata: {body: formattedBody}} : {})
            })
          }

          render({outcome, response, correlationId, headers: timingHeaders()})
        } catch (error) {
          const appError = isAppError(error) ? error : internal('internal_error', 'Unexpected internal error')
          reasonCode = appError.code

          if (appError.status >= 500) {
            logger.error({
              event: 'request.failed',
              component: 'http.server',
              message: 'Unexpected internal error',
              reason_code: appError.code,
              metadata: {error}
            })
          } else {
            logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: `Request rejected: ${appError.code}`,
              reason_code: appError.code
            })
          }

          if (response.headersSent) {
            response.end()
            return
          }

          sendError({
            response,
            status: appError.status,
            kind: appError.code,
            message: appError.message,
            correlationId,
            headers: timingHeaders()
          })
        } finally {
          const statusCode = response.statusCode
          const baseLog = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route: path,
            method,
            status_code: statusCode,
            duration_ms: Math.max(0, now().getTime() - startedAtMs),
            ...(reasonCode ? {reason_code: reasonCode} : {})
          }

          if (statusCode >= 500) {
            logger.error(baseLog)
          } else if (statusCode >= 400) {
            logger.warn(baseLog)
          } else {
            logger.info(baseLog)
          }
        }
      }
    )
  }
}
