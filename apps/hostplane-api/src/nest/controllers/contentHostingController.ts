import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {
  ContentHostingConfigurationResponseSchema,
  PurgeRequestSchema,
  PurgeResponseSchema,
  ResourceListResponseSchema
} from '@hostplane/schemas'

import {notFound} from '../../errors'
import {parseFormBody, readJsonBody, sendJson, sendNoContent} from '../../http'
import {
  CONTENT_HOSTING_BASE_PATH,
  HostplaneApiControllerContext,
  requirePathParam,
  resourcePath
} from '../controllerContext'

@Controller()
export class ContentHostingController {
  public constructor(@Inject(HostplaneApiControllerContext) private readonly context: HostplaneApiControllerContext) {}

  @Get(CONTENT_HOSTING_BASE_PATH)
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        const payload = ResourceListResponseSchema.parse(
          this.context.store.listSessionIds().map(sessionId => resourcePath(CONTENT_HOSTING_BASE_PATH, sessionId))
        )
        sendJson({response, status: 200, correlationId, payload})
      }
    })
  }

  @Post(`${CONTENT_HOSTING_BASE_PATH}/:sessionId`)
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const sessionId = requirePathParam(request, 'sessionId')
        const body = await readJsonBody({request, maxBodyBytes: this.context.config.maxBodyBytes})

        await this.context.store.put(sessionId, body, {expect: 'absent'})

        sendJson({
          response,
          status: 201,
          correlationId,
          payload: this.readSession(sessionId),
          headers: {location: resourcePath(CONTENT_HOSTING_BASE_PATH, sessionId)}
        })
      }
    })
  }

  @Get(`${CONTENT_HOSTING_BASE_PATH}/:sessionId`)
  public async get(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        const sessionId = requirePathParam(request, 'sessionId')
        sendJson({response, status: 200, correlationId, payload: this.readSession(sessionId)})
      }
    })
  }

  @Put(`${CONTENT_HOSTING_BASE_PATH}/:sessionId`)
  public async update(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const sessionId = requirePathParam(request, 'sessionId')
        const body = await readJsonBody({request, maxBodyBytes: this.context.config.maxBodyBytes})

        const result = await this.context.store.put(sessionId, body, {expect: 'present'})
        if (!result.changed) {
          sendNoContent({response, correlationId})
          return
        }

        sendJson({response, status: 200, correlationId, payload: this.readSession(sessionId)})
      }
    })
  }

  @Delete(`${CONTENT_HOSTING_BASE_PATH}/:sessionId`)
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const sessionId = requirePathParam(request, 'sessionId')
        await this.context.store.delete(sessionId)
        sendNoContent({response, correlationId})
      }
    })
  }

  @Post(`${CONTENT_HOSTING_BASE_PATH}/:sessionId/purge`)
  public async purge(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const sessionId = requirePathParam(request, 'sessionId')
        const form = await parseFormBody({
          request,
          schema: PurgeRequestSchema,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        const purged = await this.context.store.purge(sessionId, form.pattern === undefined ? {} : {pattern: form.pattern})
        sendJson({response, status: 200, correlationId, payload: PurgeResponseSchema.parse({purged})})
      }
    })
  }

  private readSession(sessionId: string) {
    const configuration = this.context.store.getSession(sessionId)
    if (!configuration) {
      throw notFound('session_not_found', `Unknown session ${sessionId}`)
    }
    return ContentHostingConfigurationResponseSchema.parse(configuration)
  }
}
