import {randomUUID} from 'node:crypto'
import type {IncomingMessage} from 'node:http'

import {Inject, Injectable} from '@nestjs/common'
import type {Request, Response} from 'express'
import {runWithLogContext, setLogContextFields, type StructuredLogger} from '@hostplane/logging'
import type {ProvisioningStore} from '@hostplane/provisioning'

import type {ServiceConfig} from '../config'
import {badRequest, toAppError} from '../errors'
import {extractCorrelationId, sendError} from '../http'
import {HOSTPLANE_API_CONFIG, HOSTPLANE_API_LOGGER, HOSTPLANE_API_STORE} from './tokens'

export const CONTENT_HOSTING_BASE_PATH = '/3gpp-m3/v1/content-hosting-configurations'
export const CERTIFICATES_BASE_PATH = '/3gpp-m3/v1/certificates'

export type RequestHandlerContext = {
  correlationId: string
  method: string
  pathname: string
  url: URL
}

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/'
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? ''
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/'
}

const parseUrl = (request: IncomingMessage) => {
  try {
    const host = request.headers.host ?? 'localhost'
    return new URL(request.url ?? '/', `http://${host}`)
  } catch {
    throw badRequest('request_url_invalid', 'Request URL is invalid')
  }
}

export const requirePathParam = (request: Request, name: string) => {
  const value = request.params[name]
  if (value === undefined || value.length === 0) {
    throw badRequest('path_param_invalid', `Path parameter ${name} is required`)
  }
  return value
}

export const resourcePath = (basePath: string, id: string) => `${basePath}/${encodeURIComponent(id)}`

@Injectable()
export class HostplaneApiControllerContext {
  public constructor(
    @Inject(HOSTPLANE_API_CONFIG) public readonly config: ServiceConfig,
    @Inject(HOSTPLANE_API_STORE) public readonly store: ProvisioningStore,
    @Inject(HOSTPLANE_API_LOGGER) private readonly logger: StructuredLogger
  ) {}

  public async handleRequest({
    request,
    response,
    handler
  }: {
    request: Request
    response: Response
    handler: (context: RequestHandlerContext) => void | Promise<void>
  }) {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const startedAtMs = Date.now()
    const method = request.method ?? 'GET'

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        method
      },
      async () => {
        let pathname = '/'
        let responseReasonCode: string | undefined

        this.logger.debug({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route: sanitizeRouteForLog({rawUrl: request.url}),
          method
        })

        try {
          const url = parseUrl(request)
          pathname = url.pathname
          setLogContextFields({route: pathname, method})

          await handler({correlationId, method, pathname, url})
        } catch (error) {
          const appError = toAppError(error)
          if (appError) {
            responseReasonCode = appError.code
            this.logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: `Request rejected: ${appError.code}`,
              reason_code: appError.code,
              route: pathname,
              method
            })

            sendError({
              response,
              status: appError.status,
              error: appError.code,
              message: appError.message,
              correlationId
            })
            return
          }

          responseReasonCode = 'internal_error'
          this.logger.error({
            event: 'request.failed',
            component: 'http.server',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            route: pathname,
            method,
            metadata: {error}
          })

          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          })
        } finally {
          const statusCode = response.statusCode
          const baseLog = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route: pathname,
            method,
            status_code: statusCode,
            duration_ms: Math.max(0, Date.now() - startedAtMs),
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          }

          if (statusCode >= 500) {
            this.logger.error(baseLog)
          } else if (statusCode >= 400) {
            this.logger.warn(baseLog)
          } else {
            this.logger.info(baseLog)
          }
        }
      }
    )
  }
}
