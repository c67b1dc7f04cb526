import {All, Controller, Inject, Module, Req, Res, type DynamicModule} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {FetchLike} from '@jira-relay/forwarder'
import type {StructuredLogger} from '@jira-relay/logging'

import type {ServiceConfig} from '../config'
import {createProxyRequestHandler, type ProxyRequestHandler} from '../http/requestHandler'
import {
  PROXY_API_CONFIG,
  PROXY_API_FETCH_IMPL,
  PROXY_API_LOGGER,
  PROXY_API_NOW,
  PROXY_API_REQUEST_HANDLER
} from './tokens'

export type ProxyApiNestModuleOptions = {
  config: ServiceConfig
  logger: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => Date
}

@Controller()
class ProxyApiController {
  public constructor(
    @Inject(PROXY_API_REQUEST_HANDLER)
    private readonly requestHandler: ProxyRequestHandler
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.requestHandler(request, response)
  }
}

@Module({
  controllers: [ProxyApiController]
})
export class ProxyApiNestModule {
  public static register(options: ProxyApiNestModuleOptions): DynamicModule {
    return {
      module: ProxyApiNestModule,
      providers: [
        {
          provide: PROXY_API_CONFIG,
          useValue: options.config
        },
        {
          provide: PROXY_API_LOGGER,
          useValue: options.logger
        },
        {
          provide: PROXY_API_FETCH_IMPL,
          useValue: options.fetchImpl
        },
        {
          provide: PROXY_API_NOW,
          useValue: options.now
        },
        {
          provide: PROXY_API_REQUEST_HANDLER,
          inject: [PROXY_API_CONFIG, PROXY_API_LOGGER, PROXY_API_FETCH_IMPL, PROXY_API_NOW],
          useFactory: (
            config: ServiceConfig,
            logger: StructuredLogger,
            fetchImpl: FetchLike | undefined,
            now: (() => Date) | undefined
          ) =>
            createProxyRequestHandler({
              config,
              logger,
              ...(fetchImpl ? {fetchImpl} : {}),
              ...(now ? {now} : {})
            })
        }
      ]
    }
  }
}
