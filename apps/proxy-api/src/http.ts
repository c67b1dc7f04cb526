import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ProxyErrorPayloadSchema} from '@jira-relay/schemas'

import {badRequest, payloadTooLarge} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'x-xss-protection': '1; mode=block',
  'referrer-policy': 'no-referrer',
  'cache-control': 'no-store'
}

type ResponseSink = Pick<ServerResponse, 'writeHead' | 'end'>

const readSingleHeader = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value)

export const extractCorrelationId = (request: Pick<IncomingMessage, 'headers'>) => {
  const value =
    readSingleHeader(request.headers['x-correlation-id']) ?? readSingleHeader(request.headers['x-request-id'])
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: AsyncIterable<unknown>
  maxBodyBytes: number
}) => {
  const chunks: Buffer[] = []
  let size = 0
  let exceeded = false

  // Oversized bodies are drained rather than abandoned so the socket can still carry the 413.
  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      exceeded = true
      continue
    }

    chunks.push(bufferChunk)
  }

  if (exceeded) {
    throw payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
  }

  return Buffer.concat(chunks)
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendRaw = ({
  response,
  status,
  body,
  contentType,
  location,
  correlationId,
  headers
}: {
  response: ResponseSink
  status: number
  body: Buffer
  contentType?: string
  location?: string
  correlationId: string
  headers?: Record<string, string>
}) => {
  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    ...(contentType ? {'content-type': contentType} : {}),
    ...(location ? {location} : {}),
    'content-length': String(body.length),
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ResponseSink
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  sendRaw({
    response,
    status,
    body: serialize(payload),
    contentType: 'application/json; charset=utf-8',
    correlationId,
    ...(headers ? {headers} : {})
  })
}

export const sendError = ({
  response,
  status,
  kind,
  message,
  correlationId,
  upstreamStatus,
  details,
  headers
}: {
  response: ResponseSink
  status: number
  kind: string
  message: string
  correlationId: string
  upstreamStatus?: number
  details?: unknown
  headers?: Record<string, string>
}) => {
  const payload = ProxyErrorPayloadSchema.parse({
    kind,
    message,
    correlation_id: correlationId,
    ...(upstreamStatus !== undefined ? {upstream_status: upstreamStatus} : {}),
    ...(details !== undefined ? {details} : {})
  })

  sendJson({
    response,
    status,
    payload,
    correlationId,
    ...(headers ? {headers} : {})
  })
}
