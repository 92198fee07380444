import 'reflect-metadata'

import {createStructuredLogger} from '@hostplane/logging'

import {createHostplaneApiApp, type HostplaneApiApp} from './app'
import {loadConfig} from './config'

export const appName = 'hostplane-api'

export {createHostplaneApiApp, type HostplaneApiApp} from './app'
export {loadConfig, type ServiceConfig} from './config'

const main = async () => {
  const config = loadConfig(process.env)

  let app: HostplaneApiApp | null = null
  let stopping: Promise<void> | null = null

  const shutdown = (exitCode: number) => {
    if (!stopping) {
      stopping = (app ? app.stop() : Promise.resolve()).then(
        () => process.exit(exitCode),
        error => {
          app?.logger.error({
            event: 'process.shutdown.failed',
            component: 'process.entrypoint',
            reason_code: 'shutdown_failed',
            metadata: {error}
          })
          process.exit(1)
        }
      )
    }
    return stopping
  }

  app = await createHostplaneApiApp({
    config,
    overrides: {
      onFatal: () => {
        void shutdown(1)
      }
    }
  })
  const {logger, runtime} = app

  await app.start()
  logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    metadata: {host: config.host, port: config.port, proxy_daemon: config.proxy.daemon}
  })

  process.on('SIGINT', () => {
    void shutdown(0)
  })
  process.on('SIGTERM', () => {
    void shutdown(0)
  })
  process.on('SIGHUP', () => {
    void runtime.store.reapply().then(
      () => {
        logger.info({event: 'process.reapply.completed', component: 'process.entrypoint'})
      },
      error => {
        logger.error({
          event: 'process.reapply.failed',
          component: 'process.entrypoint',
          reason_code: 'reapply_failed',
          metadata: {error}
        })
      }
    )
  })
}

if (require.main === module) {
  void main().catch(error => {
    const env =
      process.env.NODE_ENV === 'production'
        ? 'production'
        : process.env.NODE_ENV === 'test'
          ? 'test'
          : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Hostplane API startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
