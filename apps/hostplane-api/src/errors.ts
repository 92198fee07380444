import {
  ConflictError,
  InUseError,
  NotFoundError,
  ValidationError,
  type ValidationReason
} from '@hostplane/provisioning'
import {
  ConfigInvalidError,
  ReloadError,
  StartupError,
  SupervisorError,
  UpstreamError
} from '@hostplane/proxy-supervisor'

export type ErrorStatus = 400 | 404 | 409 | 413 | 415 | 422 | 500 | 502 | 503

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: string; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const badRequest = (code: string, message: string) => new AppError({code, message, status: 400})

export const notFound = (code: string, message: string) => new AppError({code, message, status: 404})

export const conflict = (code: string, message: string) => new AppError({code, message, status: 409})

export const payloadTooLarge = (code: string, message: string) => new AppError({code, message, status: 413})

export const unsupportedMediaType = (code: string, message: string) =>
  new AppError({code, message, status: 415})

export const unprocessable = (code: string, message: string) => new AppError({code, message, status: 422})

export const badGateway = (code: string, message: string) => new AppError({code, message, status: 502})

export const serviceUnavailable = (code: string, message: string) =>
  new AppError({code, message, status: 503})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

const validationCodes: Record<ValidationReason, {code: string; status: ErrorStatus}> = {
  invalid_identifier: {code: 'path_param_invalid', status: 400},
  invalid_record: {code: 'request_body_schema_invalid', status: 400},
  invalid_certificate: {code: 'certificate_material_invalid', status: 400},
  invalid_pattern: {code: 'purge_pattern_invalid', status: 422},
  invalid_redirect: {code: 'redirect_invalid', status: 400}
}

/** Maps store and supervisor failures onto HTTP errors; anything else stays unmapped. */
export const toAppError = (error: unknown): AppError | null => {
  if (isAppError(error)) {
    return error
  }

  if (error instanceof ValidationError) {
    return new AppError({...validationCodes[error.reason], message: error.message})
  }
  if (error instanceof NotFoundError) {
    return notFound(`${error.resource}_not_found`, error.message)
  }
  if (error instanceof ConflictError) {
    return conflict(`${error.resource}_exists`, error.message)
  }
  if (error instanceof InUseError) {
    return conflict('certificate_in_use', error.message)
  }

  if (error instanceof ConfigInvalidError) {
    return unprocessable('proxy_config_invalid', `Proxy rejected the configuration: ${error.output}`)
  }
  if (error instanceof StartupError) {
    return serviceUnavailable('proxy_startup_failed', error.message)
  }
  if (error instanceof ReloadError) {
    return serviceUnavailable('proxy_reload_failed', error.message)
  }
  if (error instanceof UpstreamError) {
    return badGateway('proxy_upstream_failed', error.message)
  }
  if (error instanceof SupervisorError) {
    return serviceUnavailable('proxy_unavailable', error.message)
  }

  return null
}
