import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ApiErrorSchema} from '@hostplane/schemas'
import type {z} from 'zod'

import {badRequest, payloadTooLarge, unsupportedMediaType} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
}

const hasContentType = (contentTypeHeader: string | undefined, expected: string) => {
  if (!contentTypeHeader) {
    return false
  }

  return (contentTypeHeader.split(';', 1)[0] ?? '').trim().toLowerCase() === expected
}

const hasPotentialBody = (request: IncomingMessage) => {
  const contentLength = request.headers['content-length']
  return request.headers['transfer-encoding'] !== undefined || (contentLength !== undefined && contentLength !== '0')
}

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

const readBodyBuffer = async ({request, maxBodyBytes}: {request: IncomingMessage; maxBodyBytes: number}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

/** Reads a JSON body without interpreting it; the provisioning store validates records itself. */
export const readJsonBody = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}): Promise<unknown> => {
  if (!hasContentType(request.headers['content-type'], 'application/json')) {
    throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json')
  }

  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  try {
    const parsedBody: unknown = JSON.parse(raw.toString('utf8'))
    return parsedBody
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }
}

export const parseJsonBody = async <TSchema extends z.ZodType>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.output<TSchema>> => {
  const body = await readJsonBody({request, maxBodyBytes})
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw badRequest('request_body_schema_invalid', parsed.error.issues.map(issue => issue.message).join('; '))
  }

  return parsed.data
}

export const readTextBody = async ({
  request,
  contentType,
  maxBodyBytes
}: {
  request: IncomingMessage
  contentType: string
  maxBodyBytes: number
}) => {
  if (!hasContentType(request.headers['content-type'], contentType)) {
    throw unsupportedMediaType('content_type_invalid', `Content-Type must be ${contentType}`)
  }

  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  return raw.toString('utf8')
}

/** Optional `application/x-www-form-urlencoded` body, validated field by field. */
export const parseFormBody = async <TSchema extends z.ZodType>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.output<TSchema>> => {
  let fields: Record<string, string> = {}
  if (hasPotentialBody(request)) {
    if (!hasContentType(request.headers['content-type'], 'application/x-www-form-urlencoded')) {
      throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/x-www-form-urlencoded')
    }
    const raw = await readBodyBuffer({request, maxBodyBytes})
    fields = Object.fromEntries(new URLSearchParams(raw.toString('utf8')).entries())
  }

  const parsed = schema.safeParse(fields)
  if (!parsed.success) {
    throw badRequest('request_body_schema_invalid', parsed.error.issues.map(issue => issue.message).join('; '))
  }

  return parsed.data
}

export const parseQuery = <TSchema extends z.ZodType>({
  searchParams,
  schema
}: {
  searchParams: URLSearchParams
  schema: TSchema
}): z.output<TSchema> => {
  const queryObject = Object.fromEntries(searchParams.entries())

  const parsed = schema.safeParse(queryObject)
  if (!parsed.success) {
    throw badRequest('query_invalid', parsed.error.issues.map(issue => issue.message).join('; '))
  }

  return parsed.data
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = serialize(payload)

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  const payload = ApiErrorSchema.parse({
    error,
    message,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    payload,
    correlationId
  })
}

export const sendNoContent = ({
  response,
  correlationId,
  headers
}: {
  response: ServerResponse
  correlationId: string
  headers?: Record<string, string>
}) => {
  response.writeHead(204, {
    ...DEFAULT_SECURITY_HEADERS,
    'x-correlation-id': correlationId,
    ...(headers ?? {})
  })

  response.end()
}
