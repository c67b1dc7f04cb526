import {describe, expect, it} from 'vitest'

import {loadConfig} from '../config'

describe('proxy-api config', () => {
  it('loads defaults from minimal env input', () => {
    const config = loadConfig({
      NODE_ENV: 'test'
    })

    expect(config).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 8000,
      maxBodyBytes: 1024 * 1024,
      debug: false,
      logging: {
        level: 'silent',
        redactExtraKeys: []
      },
      corsAllowedOrigins: '*',
      app: {
        title: 'Jira API Proxy',
        version: '1.0.0'
      },
      upstream: {
        baseUrl: 'https://your-jira-instance.atlassian.net',
        timeoutMs: 30_000,
        apiVersion: '2'
      },
      serviceAccountIncomplete: false
    })
  })

  it('parses explicit overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      JIRA_BASE_URL: 'https://jira.example.test/',
      JIRA_SERVICE_USERNAME: 'svc',
      JIRA_SERVICE_API_TOKEN: 'test-secret',
      JIRA_TIMEOUT_MS: '5000',
      JIRA_API_VERSION: 'latest',
      PROXY_HOST: '127.0.0.1',
      PROXY_PORT: '9100',
      PROXY_MAX_BODY_BYTES: '2048',
      PROXY_LOG_REDACT_EXTRA_KEYS: 'x-session, customerRef',
      PROXY_ALLOW_ORIGINS: 'https://ide.example.test, http://localhost:3000',
      APP_TITLE: 'Team Jira Proxy',
      APP_VERSION: '2.1.0',
      UNRELATED: 'ignored'
    })

    expect(config).toEqual({
      nodeEnv: 'production',
      host: '127.0.0.1',
      port: 9100,
      maxBodyBytes: 2048,
      debug: false,
      logging: {
        level: 'info',
        redactExtraKeys: ['x-session', 'customerRef']
      },
      corsAllowedOrigins: ['https://ide.example.test', 'http://localhost:3000'],
      app: {
        title: 'Team Jira Proxy',
        version: '2.1.0'
      },
      upstream: {
        baseUrl: 'https://jira.example.test',
        serviceUsername: 'svc',
        serviceApiToken: 'test-secret',
        timeoutMs: 5000,
        apiVersion: 'latest'
      },
      serviceAccountIncomplete: false
    })
    expect(Object.isFrozen(config.upstream)).toBe(true)
  })

  it('derives the log level from the debug flag unless set explicitly', () => {
    expect(loadConfig({NODE_ENV: 'development', PROXY_DEBUG: 'true'}).logging.level).toBe('debug')
    expect(loadConfig({NODE_ENV: 'development', PROXY_DEBUG: '0'}).logging.level).toBe('info')
    expect(loadConfig({NODE_ENV: 'test', PROXY_DEBUG: 'true', PROXY_LOG_LEVEL: 'WARN'}).logging.level).toBe('warn')
  })

  it('falls back to per-request auth when only one service credential is set', () => {
    const config = loadConfig({NODE_ENV: 'test', JIRA_SERVICE_USERNAME: 'svc'})

    expect(config.serviceAccountIncomplete).toBe(true)
    expect(config.upstream).toEqual({
      baseUrl: 'https://your-jira-instance.atlassian.net',
      timeoutMs: 30_000,
      apiVersion: '2'
    })
  })

  it('treats blank service credentials as unset', () => {
    const config = loadConfig({NODE_ENV: 'test', JIRA_SERVICE_USERNAME: '  ', JIRA_SERVICE_API_TOKEN: ''})

    expect(config.serviceAccountIncomplete).toBe(false)
    expect(config.upstream.serviceUsername).toBeUndefined()
  })

  it('fails closed for invalid values', () => {
    expect(() => loadConfig({NODE_ENV: 'test', JIRA_BASE_URL: 'not a url'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', PROXY_PORT: 'abc'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', PROXY_DEBUG: 'maybe'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', PROXY_LOG_LEVEL: 'verbose'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', JIRA_API_VERSION: 'v3'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', PROXY_ALLOW_ORIGINS: 'ftp://files.example.test'})).toThrow(
      'PROXY_ALLOW_ORIGINS contains an unsupported origin protocol: ftp://files.example.test'
    )
  })
})
