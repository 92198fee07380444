import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {HealthResponseSchema} from '@hostplane/schemas'

import {sendJson} from '../../http'
import {HostplaneApiControllerContext} from '../controllerContext'

@Controller()
export class HealthController {
  public constructor(@Inject(HostplaneApiControllerContext) private readonly context: HostplaneApiControllerContext) {}

  @Get('/healthz')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        const {proxy} = this.context.store.snapshot()
        const running = proxy.state === 'running'
        const payload = HealthResponseSchema.parse({
          status: running ? 'ok' : 'degraded',
          proxy: {
            state: proxy.state,
            pid: proxy.pid,
            applied_version: proxy.appliedVersion
          }
        })

        sendJson({
          response,
          status: running ? 200 : 503,
          correlationId,
          payload
        })
      }
    })
  }
}
