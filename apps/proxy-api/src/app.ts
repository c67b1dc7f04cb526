import 'reflect-metadata'

import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import type {CorsOptions} from '@nestjs/common/interfaces/external/cors-options.interface'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import type {FetchLike} from '@jira-relay/forwarder'
import {createStructuredLogger, type StructuredLogger} from '@jira-relay/logging'

import type {ServiceConfig} from './config'
import {ProxyApiNestModule} from './nest/proxyApiNestModule'

export const appName = 'proxy-api'

export const createServiceLogger = (config: ServiceConfig): StructuredLogger =>
  createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  })

/**
 * Credentialed CORS for the IDE. A wildcard echoes the caller's origin; browsers
 * reject a literal `*` next to `Access-Control-Allow-Credentials`.
 */
export const buildCorsOptions = (config: Pick<ServiceConfig, 'corsAllowedOrigins'>): CorsOptions => ({
  origin: config.corsAllowedOrigins === '*' ? true : config.corsAllowedOrigins,
  credentials: true,
  methods: ['GET', 'PUT', 'POST', 'OPTIONS'],
  exposedHeaders: ['x-correlation-id', 'x-request-id', 'x-process-time']
})

const isHttpServer = (value: unknown): value is Server =>
  typeof value === 'object' && value !== null && 'address' in value && typeof value.address === 'function'

export const createProxyApiApp = async ({
  config,
  logger = createServiceLogger(config),
  fetchImpl,
  now
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => Date
}) => {
  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )

  const nestApp = await NestFactory.create(
    ProxyApiNestModule.register({
      config,
      logger,
      ...(fetchImpl ? {fetchImpl} : {}),
      ...(now ? {now} : {})
    }),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
    }
  )

  nestApp.enableCors(buildCorsOptions(config))

  await nestApp.init()

  const httpServer: unknown = nestApp.getHttpServer()
  if (!isHttpServer(httpServer)) {
    throw new Error('Nest did not expose a node http server')
  }
  const server = httpServer

  const start = async () => {
    await nestApp.listen(config.port, config.host)
  }

  const stop = async () => {
    await nestApp.close()
  }

  return {
    server,
    start,
    stop,
    logger
  }
}

export type ProxyApiApp = Awaited<ReturnType<typeof createProxyApiApp>>
