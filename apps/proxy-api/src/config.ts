import {LogLevelSchema, type LogLevel} from '@jira-relay/logging'
import {createProcessConfig, type ProcessConfig} from '@jira-relay/schemas'
import {z} from 'zod'

export const DEFAULT_JIRA_BASE_URL = 'https://your-jira-instance.atlassian.net'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const optionalLogLevel = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const normalized = value.trim().toLowerCase()
  return normalized.length === 0 ? undefined : normalized
}, LogLevelSchema.optional())

const splitList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const parseAllowedOrigins = (raw: string | undefined): string[] | '*' => {
  const origins = splitList(raw ?? '*')
  if (origins.includes('*')) {
    return '*'
  }

  for (const origin of origins) {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`PROXY_ALLOW_ORIGINS contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`PROXY_ALLOW_ORIGINS contains an unsupported origin protocol: ${origin}`)
    }
  }

  return origins
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    JIRA_BASE_URL: z.string().trim().url().default(DEFAULT_JIRA_BASE_URL),
    JIRA_SERVICE_USERNAME: optionalString,
    JIRA_SERVICE_API_TOKEN: optionalString,
    JIRA_TIMEOUT_MS: numberFromEnv.default(30_000),
    JIRA_API_VERSION: z.string().trim().min(1).default('2'),
    PROXY_HOST: z.string().trim().min(1).default('0.0.0.0'),
    PROXY_PORT: numberFromEnv.default(8000),
    PROXY_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    PROXY_DEBUG: booleanFromEnv.default(false),
    PROXY_LOG_LEVEL: optionalLogLevel,
    PROXY_LOG_REDACT_EXTRA_KEYS: optionalString,
    PROXY_ALLOW_ORIGINS: optionalString,
    APP_TITLE: z.string().trim().min(1).default('Jira API Proxy'),
    APP_VERSION: z.string().trim().min(1).default('1.0.0')
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  debug: boolean
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  corsAllowedOrigins: string[] | '*'
  app: {
    title: string
    version: string
  }
  upstream: ProcessConfig
  // Exactly one of the two service credentials was set; requests fall back to per-request auth.
  serviceAccountIncomplete: boolean
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  JIRA_BASE_URL: env.JIRA_BASE_URL,
  JIRA_SERVICE_USERNAME: env.JIRA_SERVICE_USERNAME,
  JIRA_SERVICE_API_TOKEN: env.JIRA_SERVICE_API_TOKEN,
  JIRA_TIMEOUT_MS: env.JIRA_TIMEOUT_MS,
  JIRA_API_VERSION: env.JIRA_API_VERSION,
  PROXY_HOST: env.PROXY_HOST,
  PROXY_PORT: env.PROXY_PORT,
  PROXY_MAX_BODY_BYTES: env.PROXY_MAX_BODY_BYTES,
  PROXY_DEBUG: env.PROXY_DEBUG,
  PROXY_LOG_LEVEL: env.PROXY_LOG_LEVEL,
  PROXY_LOG_REDACT_EXTRA_KEYS: env.PROXY_LOG_REDACT_EXTRA_KEYS,
  PROXY_ALLOW_ORIGINS: env.PROXY_ALLOW_ORIGINS,
  APP_TITLE: env.APP_TITLE,
  APP_VERSION: env.APP_VERSION
})

const resolveLogLevel = ({
  explicit,
  debug,
  nodeEnv
}: {
  explicit: LogLevel | undefined
  debug: boolean
  nodeEnv: ServiceConfig['nodeEnv']
}): LogLevel => {
  if (explicit) {
    return explicit
  }
  if (debug) {
    return 'debug'
  }

  return nodeEnv === 'test' ? 'silent' : 'info'
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  const username = parsed.JIRA_SERVICE_USERNAME
  const apiToken = parsed.JIRA_SERVICE_API_TOKEN
  const serviceAccountIncomplete = (username === undefined) !== (apiToken === undefined)

  const upstream = createProcessConfig({
    baseUrl: parsed.JIRA_BASE_URL,
    ...(username && apiToken ? {serviceUsername: username, serviceApiToken: apiToken} : {}),
    timeoutMs: parsed.JIRA_TIMEOUT_MS,
    apiVersion: parsed.JIRA_API_VERSION
  })

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.PROXY_HOST,
    port: parsed.PROXY_PORT,
    maxBodyBytes: parsed.PROXY_MAX_BODY_BYTES,
    debug: parsed.PROXY_DEBUG,
    logging: {
      level: resolveLogLevel({explicit: parsed.PROXY_LOG_LEVEL, debug: parsed.PROXY_DEBUG, nodeEnv: parsed.NODE_ENV}),
      redactExtraKeys: splitList(parsed.PROXY_LOG_REDACT_EXTRA_KEYS)
    },
    corsAllowedOrigins: parseAllowedOrigins(parsed.PROXY_ALLOW_ORIGINS),
    app: {
      title: parsed.APP_TITLE,
      version: parsed.APP_VERSION
    },
    upstream,
    serviceAccountIncomplete
  }
}
