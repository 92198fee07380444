export {ArtifactStore, type ArtifactPaths} from './artifactStore';
export {
  proxyStates,
  SupervisorSettingsSchema,
  type CachePurgeFilter,
  type DaemonExit,
  type DaemonProcess,
  type DaemonValidation,
  type ProxyArtifact,
  type ProxyDaemon,
  type ProxyProcessState,
  type ProxyState,
  type SupervisorOptions,
  type SupervisorSettings
} from './contracts';
export {
  ConfigInvalidError,
  ReloadError,
  StartupError,
  SupervisorError,
  UpstreamError,
  type SupervisorErrorCode
} from './errors';
export {childProcessRunner, type CommandResult, type CommandRunner} from './nginx/commandRunner';
export {
  compilePurgeFilter,
  extractCacheKey,
  NginxDaemon,
  parseCacheKey,
  type CacheEntry,
  type NginxDaemonOptions
} from './nginx/nginxDaemon';
export {backoffDelayMs} from './retry';
export {ProxySupervisor} from './supervisor';
export {MemoryDaemon, MemoryDaemonProcess, type MemoryDaemonOptions} from './memory/memoryDaemon';
