import type {StructuredLogger} from '@hostplane/logging'
import {FileCertificateCache, ProvisioningStore, type CertificateCache} from '@hostplane/provisioning'
import {
  ArtifactStore,
  MemoryDaemon,
  NginxDaemon,
  ProxySupervisor,
  type DaemonExit,
  type ProxyDaemon
} from '@hostplane/proxy-supervisor'
import {RedirectTable} from '@hostplane/redirect-table'

import type {ServiceConfig} from './config'

// More launches than this inside the daemon's rapid-start window means the
// proxy is crash looping; restarting it again would only repeat the failure.
export const MAX_RAPID_STARTS = 5

export type HostplaneRuntimeOverrides = {
  daemon?: ProxyDaemon
  certificates?: CertificateCache
  now?: () => number
  onFatal?: (reason: string) => void
}

const createDaemon = ({config, logger}: {config: ServiceConfig; logger: StructuredLogger}): ProxyDaemon => {
  if (config.proxy.daemon === 'memory') {
    return new MemoryDaemon()
  }

  return new NginxDaemon({
    binary: config.proxy.binary,
    errorLogPath: config.generator.errorLogPath,
    ...(config.generator.cacheDir ? {cacheDir: config.generator.cacheDir} : {}),
    ...(config.proxy.healthUrl ? {healthUrl: config.proxy.healthUrl} : {}),
    logger
  })
}

/**
 * Wires the redirect table, proxy daemon, supervisor, certificate cache and
 * provisioning store for one process. An unexpected proxy exit triggers a
 * re-apply of the committed state unless the proxy is crash looping.
 */
export const createHostplaneRuntime = ({
  config,
  logger,
  overrides = {}
}: {
  config: ServiceConfig
  logger: StructuredLogger
  overrides?: HostplaneRuntimeOverrides
}) => {
  const daemon = overrides.daemon ?? createDaemon({config, logger})
  const redirects = new RedirectTable({
    ttlSeconds: config.redirects.ttlSeconds,
    shardCount: config.redirects.shardCount,
    ...(overrides.now ? {now: overrides.now} : {}),
    logger
  })

  const recover = async (exit: DaemonExit) => {
    if (daemon instanceof NginxDaemon && daemon.rapidStarts() > MAX_RAPID_STARTS) {
      logger.fatal({
        event: 'proxy.restart.abandoned',
        component: 'process.runtime',
        reason_code: 'crash_loop',
        metadata: {rapid_starts: daemon.rapidStarts(), code: exit.code, signal: exit.signal}
      })
      overrides.onFatal?.('proxy is crash looping')
      return
    }

    try {
      await store.reapply()
      logger.info({event: 'proxy.restart.completed', component: 'process.runtime'})
    } catch (error) {
      logger.error({
        event: 'proxy.restart.failed',
        component: 'process.runtime',
        reason_code: 'restart_failed',
        metadata: {error}
      })
    }
  }

  const supervisor = new ProxySupervisor(daemon, new ArtifactStore({directory: config.proxy.workDir}), {
    readinessTimeoutMs: config.proxy.readinessTimeoutMs,
    reloadTimeoutMs: config.proxy.reloadTimeoutMs,
    shutdownTimeoutMs: config.proxy.shutdownTimeoutMs,
    maxAttempts: config.proxy.maxAttempts,
    retryBackoffMs: config.proxy.retryBackoffMs,
    ...(overrides.now ? {now: overrides.now} : {}),
    logger,
    onUnexpectedExit: exit => {
      void recover(exit)
    }
  })

  const certificates = overrides.certificates ?? new FileCertificateCache(config.certificatesDir)

  const store = new ProvisioningStore({
    supervisor,
    redirects,
    certificates,
    generatorOptions: {
      ...config.generator,
      workDir: config.proxy.workDir
    },
    logger,
    ...(overrides.now ? {now: overrides.now} : {})
  })

  return {daemon, redirects, supervisor, certificates, store}
}

export type HostplaneRuntime = ReturnType<typeof createHostplaneRuntime>
