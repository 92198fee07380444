import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {
  RedirectAllocateRequestSchema,
  RedirectAllocateResponseSchema,
  RedirectResolveQuerySchema,
  RedirectResolveResponseSchema
} from '@hostplane/schemas'

import {parseJsonBody, parseQuery, sendJson} from '../../http'
import {HostplaneApiControllerContext} from '../controllerContext'

// Resolve is called per request by the proxy locations generated with a redirect hook
// (HOSTPLANE_REDIRECT_RESOLVE_URL); allocate by whatever follows origin redirects.
@Controller()
export class RedirectsController {
  public constructor(@Inject(HostplaneApiControllerContext) private readonly context: HostplaneApiControllerContext) {}

  @Post('/internal/v1/redirects')
  public async allocate(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const body = await parseJsonBody({
          request,
          schema: RedirectAllocateRequestSchema,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        const key = this.context.store.allocateRedirect(body.session_prefix, body.upstream_prefix)
        sendJson({
          response,
          status: 200,
          correlationId,
          payload: RedirectAllocateResponseSchema.parse({key})
        })
      }
    })
  }

  @Get('/internal/v1/redirects/resolve')
  public async resolve(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId, url}) => {
        const query = parseQuery({searchParams: url.searchParams, schema: RedirectResolveQuerySchema})
        const resolution = this.context.store.resolvePath(
          query.path,
          query.host === undefined ? {} : {host: query.host}
        )

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: RedirectResolveResponseSchema.parse({
            upstream: resolution.upstream,
            remainder: resolution.remainder,
            redirected: resolution.key !== null
          })
        })
      }
    })
  }
}
