import type {NextFunction, Request, Response} from 'express'

import {extractCorrelationId, sendError} from '../http'

const danglingPercentPattern = /%(?![0-9A-Fa-f]{2})/u
const decodeFailurePattern = /failed to decode param|uri malformed/iu

const rejectPathEncoding = (request: Request, response: Response) => {
  sendError({
    response,
    status: 400,
    error: 'path_param_invalid',
    message: 'Path parameter encoding is invalid',
    correlationId: extractCorrelationId(request)
  })
}

/** True when the path carries a `%` escape that cannot decode to UTF-8. */
export const hasInvalidPathEncoding = (url: string) => {
  const path = url.split('?', 1)[0] ?? '/'
  if (danglingPercentPattern.test(path)) {
    return true
  }
  try {
    decodeURIComponent(path)
    return false
  } catch {
    return true
  }
}

/** Runs ahead of routing so session and certificate ids always decode. */
export const pathEncodingGuard = (request: Request, response: Response, next: NextFunction) => {
  if (hasInvalidPathEncoding(request.url ?? '/')) {
    rejectPathEncoding(request, response)
    return
  }
  next()
}

/** Express error handler for parameter decode failures raised by the router. */
export const paramDecodeErrorHandler = (error: unknown, request: Request, response: Response, next: NextFunction) => {
  const decodeFailure = error instanceof URIError || (error instanceof Error && decodeFailurePattern.test(error.message))
  if (!decodeFailure || response.headersSent) {
    next(error)
    return
  }
  rejectPathEncoding(request, response)
}
