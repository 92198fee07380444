import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {CertificateResponseSchema, ResourceListResponseSchema} from '@hostplane/schemas'

import {readTextBody, sendJson, sendNoContent} from '../../http'
import {CERTIFICATES_BASE_PATH, HostplaneApiControllerContext, requirePathParam, resourcePath} from '../controllerContext'

const PEM_CONTENT_TYPE = 'application/x-pem-file'

@Controller()
export class CertificatesController {
  public constructor(@Inject(HostplaneApiControllerContext) private readonly context: HostplaneApiControllerContext) {}

  @Get(CERTIFICATES_BASE_PATH)
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        const payload = ResourceListResponseSchema.parse(
          this.context.store
            .listCertificateIds()
            .map(certificateId => resourcePath(CERTIFICATES_BASE_PATH, certificateId))
        )
        sendJson({response, status: 200, correlationId, payload})
      }
    })
  }

  @Post(`${CERTIFICATES_BASE_PATH}/:certificateId`)
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const certificateId = requirePathParam(request, 'certificateId')
        const material = await readTextBody({
          request,
          contentType: PEM_CONTENT_TYPE,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        await this.context.store.putCertificate(certificateId, material, {expect: 'absent'})

        sendJson({
          response,
          status: 201,
          correlationId,
          payload: CertificateResponseSchema.parse({certificate_id: certificateId}),
          headers: {location: resourcePath(CERTIFICATES_BASE_PATH, certificateId)}
        })
      }
    })
  }

  @Put(`${CERTIFICATES_BASE_PATH}/:certificateId`)
  public async update(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const certificateId = requirePathParam(request, 'certificateId')
        const material = await readTextBody({
          request,
          contentType: PEM_CONTENT_TYPE,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        const result = await this.context.store.putCertificate(certificateId, material, {expect: 'present'})
        if (!result.changed) {
          sendNoContent({response, correlationId})
          return
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: CertificateResponseSchema.parse({certificate_id: certificateId})
        })
      }
    })
  }

  @Delete(`${CERTIFICATES_BASE_PATH}/:certificateId`)
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const certificateId = requirePathParam(request, 'certificateId')
        await this.context.store.deleteCertificate(certificateId)
        sendNoContent({response, correlationId})
      }
    })
  }
}
