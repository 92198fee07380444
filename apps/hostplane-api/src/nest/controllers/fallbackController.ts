import {All, Controller, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {notFound} from '../../errors'
import {HostplaneApiControllerContext} from '../controllerContext'

@Controller()
export class FallbackController {
  public constructor(@Inject(HostplaneApiControllerContext) private readonly context: HostplaneApiControllerContext) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: () => {
        throw notFound('route_not_found', 'Route not found')
      }
    })
  }
}
