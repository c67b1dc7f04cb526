import {composeHeaders, resolveAuthDecision, toLoggableHeaders, type ComposedHeaders} from '@jira-relay/auth'
import {mapEndpoint, upstreamPathFor} from '@jira-relay/endpoint-mapper'
import {
  buildOutboundCall,
  buildUpstreamUrl,
  forwardUpstreamCall,
  normalizeUpstreamFailure,
  probeUpstream,
  type FetchLike,
  type OutboundCall,
  type UpstreamReply
} from '@jira-relay/forwarder'
import {formatBodyForLog, setLogContextFields, type StructuredLogger} from '@jira-relay/logging'
import type {ClassifiedError, HealthReport, InboundRequest, ProcessConfig} from '@jira-relay/schemas'
import {HeaderMap} from '@jira-relay/shared'

export type RelayOutcome =
  | {type: 'upstream'; reply: UpstreamReply}
  | {type: 'health'; report: HealthReport}
  | {type: 'error'; error: ClassifiedError}

const unauthenticatedHeaders = (): ComposedHeaders => ({
  headers: new HeaderMap().set('accept', 'application/json'),
  sensitiveHeaderNames: new Set<string>()
})

const buildProbeCall = ({upstream, composed}: {upstream: ProcessConfig; composed: ComposedHeaders}): OutboundCall => ({
  method: 'GET',
  url: buildUpstreamUrl({
    baseUrl: upstream.baseUrl,
    upstreamPath: upstreamPathFor({apiVersion: upstream.apiVersion, suffix: 'serverInfo'}),
    query: ''
  }),
  headers: composed.headers.clone(),
  sensitiveHeaderNames: composed.sensitiveHeaderNames
})

const logOutboundCall = ({logger, call}: {logger: StructuredLogger; call: OutboundCall}) => {
  if (!logger.isLevelEnabled('debug')) {
    return
  }

  const body = formatBodyForLog({body: call.body})
  logger.debug({
    event: 'upstream.request',
    component: 'relay.forwarder',
    message: `${call.method} ${call.url}`,
    metadata: {
      headers: toLoggableHeaders(call),
      ...(body ? {body} : {})
    }
  })
}

/**
 * Runs one inbound request through mapping, credential resolution, header
 * composition and the single upstream attempt. Never throws for upstream or
 * client-side failures; those come back as classified errors.
 */
export const relayInboundRequest = async ({
  request,
  upstream,
  logger,
  fetchImpl
}: {
  request: InboundRequest
  upstream: ProcessConfig
  logger: StructuredLogger
  fetchImpl?: FetchLike
}): Promise<RelayOutcome> => {
  const mapped = mapEndpoint({
    method: request.method,
    path: request.path,
    query: request.query,
    ...(request.body ? {body: request.body} : {}),
    apiVersion: upstream.apiVersion
  })
  if (!mapped.ok) {
    return {type: 'error', error: mapped.error}
  }

  const target = mapped.value
  setLogContextFields({operation: target.operation, dialect: target.dialect})

  const decision = resolveAuthDecision({
    config: upstream,
    authorizationHeader: request.headers.get('authorization')
  })
  if (decision.ok) {
    setLogContextFields({auth_mode: decision.value.mode})
  }

  if (target.kind === 'health') {
    const composed = decision.ok ? composeHeaders(decision.value) : unauthenticatedHeaders()
    const call = buildProbeCall({upstream, composed})
    logOutboundCall({logger, call})

    const report = await probeUpstream({call, timeoutMs: upstream.timeoutMs, ...(fetchImpl ? {fetchImpl} : {})})
    if (report.status === 'degraded') {
      logger.warn({
        event: 'upstream.health_degraded',
        component: 'relay.health',
        message: 'Jira health probe failed',
        reason_code: report.upstream.reason,
        ...(report.upstream.status_code !== undefined ? {status_code: report.upstream.status_code} : {})
      })
    }

    return {type: 'health', report}
  }

  if (!decision.ok) {
    return {type: 'error', error: decision.error}
  }

  const call = buildOutboundCall({
    target,
    baseUrl: upstream.baseUrl,
    composed: composeHeaders(decision.value)
  })
  logOutboundCall({logger, call})

  const outcome = await forwardUpstreamCall({
    call,
    timeoutMs: upstream.timeoutMs,
    ...(fetchImpl ? {fetchImpl} : {})
  })

  if (outcome.ok) {
    logger.debug({
      event: 'upstream.response',
      component: 'relay.forwarder',
      message: `Jira responded to ${target.operation}`,
      status_code: outcome.value.statusCode,
      operation: target.operation,
      dialect: target.dialect,
      auth_mode: decision.value.mode
    })

    return {type: 'upstream', reply: outcome.value}
  }

  const classified = normalizeUpstreamFailure(outcome.error)
  logger.warn({
    event: 'upstream.failed',
    component: 'relay.forwarder',
    message: classified.message,
    reason_code: classified.reason,
    ...(classified.kind === 'upstream_rejected' ? {status_code: classified.status_code} : {}),
    operation: target.operation,
    dialect: target.dialect,
    auth_mode: decision.value.mode,
    ...(outcome.error.type === 'exception' ? {metadata: {error: outcome.error.error}} : {})
  })

  return {type: 'error', error: classified}
}
