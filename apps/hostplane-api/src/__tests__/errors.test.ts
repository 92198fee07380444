import {ConflictError, InUseError, NotFoundError, ValidationError} from '@hostplane/provisioning'
import {ConfigInvalidError, ReloadError, StartupError, SupervisorError, UpstreamError} from '@hostplane/proxy-supervisor'
import {describe, expect, it} from 'vitest'

import {AppError, badRequest, toAppError} from '../errors'

const mapped = (error: unknown) => {
  const appError = toAppError(error)
  return appError ? {status: appError.status, code: appError.code} : null
}

describe('toAppError', () => {
  it('passes application errors through unchanged', () => {
    const error = badRequest('query_invalid', 'bad query')
    expect(toAppError(error)).toBe(error)
  })

  it('maps validation reasons to request errors', () => {
    expect(mapped(new ValidationError('invalid_identifier', ['bad id']))).toEqual({
      status: 400,
      code: 'path_param_invalid'
    })
    expect(mapped(new ValidationError('invalid_record', []))).toEqual({
      status: 400,
      code: 'request_body_schema_invalid'
    })
    expect(mapped(new ValidationError('invalid_pattern', ['bad regex']))).toEqual({
      status: 422,
      code: 'purge_pattern_invalid'
    })
  })

  it('keeps the validation issues as the message', () => {
    const appError = toAppError(new ValidationError('invalid_record', ['a: first', 'b: second']))
    expect(appError?.message).toBe('a: first; b: second')
  })

  it('maps store lookups and conflicts', () => {
    expect(mapped(new NotFoundError('session', 'S1'))).toEqual({status: 404, code: 'session_not_found'})
    expect(mapped(new NotFoundError('route', '/m4d/'))).toEqual({status: 404, code: 'route_not_found'})
    expect(mapped(new ConflictError('certificate', 'c1'))).toEqual({status: 409, code: 'certificate_exists'})
    expect(mapped(new InUseError('c1', ['S1']))).toEqual({status: 409, code: 'certificate_in_use'})
  })

  it('maps proxy failures', () => {
    expect(mapped(new ConfigInvalidError('unknown directive'))).toEqual({status: 422, code: 'proxy_config_invalid'})
    expect(mapped(new StartupError(3))).toEqual({status: 503, code: 'proxy_startup_failed'})
    expect(mapped(new ReloadError({fatal: false, restoredVersion: 'v1'}))).toEqual({
      status: 503,
      code: 'proxy_reload_failed'
    })
    expect(mapped(new UpstreamError('cache unreadable'))).toEqual({status: 502, code: 'proxy_upstream_failed'})
    expect(mapped(new SupervisorError('invalid_state', 'busy'))).toEqual({status: 503, code: 'proxy_unavailable'})
  })

  it('leaves unexpected errors unmapped', () => {
    expect(toAppError(new Error('boom'))).toBeNull()
    expect(toAppError('boom')).toBeNull()
    expect(new AppError({code: 'x', message: 'y', status: 500}).name).toBe('AppError')
  })
})
