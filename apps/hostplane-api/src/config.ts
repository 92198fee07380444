import {LogLevelSchema, type LogLevel} from '@hostplane/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const absolutePath = z
  .string()
  .trim()
  .refine(value => value.startsWith('/'), {message: 'Path must be absolute'})

const optionalAbsolutePath = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, absolutePath.optional())

const portFromEnv = numberFromEnv.pipe(z.number().max(65_535))

const parseKeyList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOSTPLANE_API_HOST: z.string().default('127.0.0.1'),
    HOSTPLANE_API_PORT: z
      .preprocess(
        value => (typeof value === 'string' && value.trim().length > 0 ? Number.parseInt(value, 10) : value),
        z.number().int().gte(0).lte(65_535)
      )
      .default(7777),
    HOSTPLANE_API_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    HOSTPLANE_PROXY_DAEMON: z.enum(['nginx', 'memory']).default('nginx'),
    HOSTPLANE_PROXY_BINARY: z.string().trim().min(1).default('nginx'),
    HOSTPLANE_PROXY_WORK_DIR: absolutePath.default('/var/cache/hostplane/proxy'),
    HOSTPLANE_CERTIFICATES_DIR: absolutePath.default('/var/cache/hostplane/certificates'),
    HOSTPLANE_CACHE_DIR: optionalAbsolutePath,
    HOSTPLANE_LISTEN_ADDRESS: z.string().trim().min(1).default('[::]'),
    HOSTPLANE_HTTP_PORT: portFromEnv.default(80),
    HOSTPLANE_HTTPS_PORT: portFromEnv.default(443),
    HOSTPLANE_ACCESS_LOG: absolutePath.default('/var/log/hostplane/access.log'),
    HOSTPLANE_ERROR_LOG: absolutePath.default('/var/log/hostplane/error.log'),
    HOSTPLANE_PROXY_HEALTH_URL: optionalString.pipe(z.url().optional()),
    HOSTPLANE_READINESS_TIMEOUT_MS: numberFromEnv.default(5_000),
    HOSTPLANE_RELOAD_TIMEOUT_MS: numberFromEnv.default(5_000),
    HOSTPLANE_SHUTDOWN_TIMEOUT_MS: numberFromEnv.default(10_000),
    HOSTPLANE_MAX_ATTEMPTS: numberFromEnv.pipe(z.number().max(10)).default(3),
    HOSTPLANE_RETRY_BACKOFF_MS: numberFromEnv.default(200),
    HOSTPLANE_REDIRECT_TTL_SECONDS: numberFromEnv.pipe(z.number().max(86_400)).default(120),
    HOSTPLANE_REDIRECT_RESOLVE_URL: optionalString.pipe(z.url({protocol: /^https?$/u}).optional()),
    HOSTPLANE_PROXY_RESOLVER: z.string().trim().min(1).default('127.0.0.53'),
    HOSTPLANE_REDIRECT_SHARDS: numberFromEnv.pipe(z.number().max(1_024)).default(16),
    HOSTPLANE_LOG_LEVEL: LogLevelSchema.optional(),
    HOSTPLANE_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict()

export type ProxyDaemonMode = 'nginx' | 'memory'

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  proxy: {
    daemon: ProxyDaemonMode
    binary: string
    workDir: string
    healthUrl?: string
    readinessTimeoutMs: number
    reloadTimeoutMs: number
    shutdownTimeoutMs: number
    maxAttempts: number
    retryBackoffMs: number
  }
  certificatesDir: string
  generator: {
    listenAddress: string
    httpPort: number
    httpsPort: number
    accessLogPath: string
    errorLogPath: string
    cacheDir?: string
    redirectHook?: {
      resolveUrl: string
      resolver: string
    }
  }
  redirects: {
    ttlSeconds: number
    shardCount: number
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  HOSTPLANE_API_HOST: env.HOSTPLANE_API_HOST,
  HOSTPLANE_API_PORT: env.HOSTPLANE_API_PORT,
  HOSTPLANE_API_MAX_BODY_BYTES: env.HOSTPLANE_API_MAX_BODY_BYTES,
  HOSTPLANE_PROXY_DAEMON: env.HOSTPLANE_PROXY_DAEMON,
  HOSTPLANE_PROXY_BINARY: env.HOSTPLANE_PROXY_BINARY,
  HOSTPLANE_PROXY_WORK_DIR: env.HOSTPLANE_PROXY_WORK_DIR,
  HOSTPLANE_CERTIFICATES_DIR: env.HOSTPLANE_CERTIFICATES_DIR,
  HOSTPLANE_CACHE_DIR: env.HOSTPLANE_CACHE_DIR,
  HOSTPLANE_LISTEN_ADDRESS: env.HOSTPLANE_LISTEN_ADDRESS,
  HOSTPLANE_HTTP_PORT: env.HOSTPLANE_HTTP_PORT,
  HOSTPLANE_HTTPS_PORT: env.HOSTPLANE_HTTPS_PORT,
  HOSTPLANE_ACCESS_LOG: env.HOSTPLANE_ACCESS_LOG,
  HOSTPLANE_ERROR_LOG: env.HOSTPLANE_ERROR_LOG,
  HOSTPLANE_PROXY_HEALTH_URL: env.HOSTPLANE_PROXY_HEALTH_URL,
  HOSTPLANE_READINESS_TIMEOUT_MS: env.HOSTPLANE_READINESS_TIMEOUT_MS,
  HOSTPLANE_RELOAD_TIMEOUT_MS: env.HOSTPLANE_RELOAD_TIMEOUT_MS,
  HOSTPLANE_SHUTDOWN_TIMEOUT_MS: env.HOSTPLANE_SHUTDOWN_TIMEOUT_MS,
  HOSTPLANE_MAX_ATTEMPTS: env.HOSTPLANE_MAX_ATTEMPTS,
  HOSTPLANE_RETRY_BACKOFF_MS: env.HOSTPLANE_RETRY_BACKOFF_MS,
  HOSTPLANE_REDIRECT_TTL_SECONDS: env.HOSTPLANE_REDIRECT_TTL_SECONDS,
  HOSTPLANE_REDIRECT_RESOLVE_URL: env.HOSTPLANE_REDIRECT_RESOLVE_URL,
  HOSTPLANE_PROXY_RESOLVER: env.HOSTPLANE_PROXY_RESOLVER,
  HOSTPLANE_REDIRECT_SHARDS: env.HOSTPLANE_REDIRECT_SHARDS,
  HOSTPLANE_LOG_LEVEL: env.HOSTPLANE_LOG_LEVEL,
  HOSTPLANE_LOG_REDACT_EXTRA_KEYS: env.HOSTPLANE_LOG_REDACT_EXTRA_KEYS
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (parsed.HOSTPLANE_CACHE_DIR && parsed.HOSTPLANE_CACHE_DIR === parsed.HOSTPLANE_PROXY_WORK_DIR) {
    throw new Error('HOSTPLANE_CACHE_DIR must differ from HOSTPLANE_PROXY_WORK_DIR')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOSTPLANE_API_HOST,
    port: parsed.HOSTPLANE_API_PORT,
    maxBodyBytes: parsed.HOSTPLANE_API_MAX_BODY_BYTES,
    logging: {
      level: parsed.HOSTPLANE_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseKeyList(parsed.HOSTPLANE_LOG_REDACT_EXTRA_KEYS)
    },
    proxy: {
      daemon: parsed.HOSTPLANE_PROXY_DAEMON,
      binary: parsed.HOSTPLANE_PROXY_BINARY,
      workDir: parsed.HOSTPLANE_PROXY_WORK_DIR,
      ...(parsed.HOSTPLANE_PROXY_HEALTH_URL ? {healthUrl: parsed.HOSTPLANE_PROXY_HEALTH_URL} : {}),
      readinessTimeoutMs: parsed.HOSTPLANE_READINESS_TIMEOUT_MS,
      reloadTimeoutMs: parsed.HOSTPLANE_RELOAD_TIMEOUT_MS,
      shutdownTimeoutMs: parsed.HOSTPLANE_SHUTDOWN_TIMEOUT_MS,
      maxAttempts: parsed.HOSTPLANE_MAX_ATTEMPTS,
      retryBackoffMs: parsed.HOSTPLANE_RETRY_BACKOFF_MS
    },
    certificatesDir: parsed.HOSTPLANE_CERTIFICATES_DIR,
    generator: {
      listenAddress: parsed.HOSTPLANE_LISTEN_ADDRESS,
      httpPort: parsed.HOSTPLANE_HTTP_PORT,
      httpsPort: parsed.HOSTPLANE_HTTPS_PORT,
      accessLogPath: parsed.HOSTPLANE_ACCESS_LOG,
      errorLogPath: parsed.HOSTPLANE_ERROR_LOG,
      ...(parsed.HOSTPLANE_CACHE_DIR ? {cacheDir: parsed.HOSTPLANE_CACHE_DIR} : {}),
      ...(parsed.HOSTPLANE_REDIRECT_RESOLVE_URL
        ? {redirectHook: {resolveUrl: parsed.HOSTPLANE_REDIRECT_RESOLVE_URL, resolver: parsed.HOSTPLANE_PROXY_RESOLVER}}
        : {})
    },
    redirects: {
      ttlSeconds: parsed.HOSTPLANE_REDIRECT_TTL_SECONDS,
      shardCount: parsed.HOSTPLANE_REDIRECT_SHARDS
    }
  }
}
