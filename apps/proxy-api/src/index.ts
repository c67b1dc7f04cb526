import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@jira-relay/logging'
import {hasServiceAccount} from '@jira-relay/schemas'

import {appName, createProxyApiApp, createServiceLogger} from './app'
import {loadConfig} from './config'

export * from './app'
export * from './config'
export * from './errors'
export * from './http'
export * from './http/requestHandler'
export * from './relay'

const main = async () => {
  const config = loadConfig(process.env)
  const logger = createServiceLogger(config)

  if (config.serviceAccountIncomplete) {
    logger.warn({
      event: 'config.service_account_incomplete',
      component: 'process.entrypoint',
      message:
        'Only one of JIRA_SERVICE_USERNAME and JIRA_SERVICE_API_TOKEN is set; falling back to per-request credentials'
    })
  }

  const app = await createProxyApiApp({config, logger})
  await app.start()

  logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: `${config.app.title} listening on ${config.host}:${config.port}`,
    auth_mode: hasServiceAccount(config.upstream) ? 'service_account' : 'per_request',
    metadata: {
      jira_base_url: config.upstream.baseUrl,
      debug: config.debug
    }
  })

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({
      event: 'process.stopping',
      component: 'process.entrypoint',
      message: `Received ${signal}, shutting down`
    })

    try {
      await app.stop()
      process.exit(0)
    } catch (error) {
      logger.error({
        event: 'process.shutdown.failed',
        component: 'process.entrypoint',
        message: 'Graceful shutdown failed',
        metadata: {error}
      })
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Proxy API startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
