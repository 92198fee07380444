import {createNoopLogger, type BoundLogger} from '@hostplane/logging';

import type {ArtifactStore} from './artifactStore';
import {
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
import {
  ConfigInvalidError,
  describeError,
  ReloadError,
  StartupError,
  SupervisorError,
  UpstreamError
} from './errors';
import {backoffDelayMs, defaultSleep, pollUntil} from './retry';

/**
 * Drives one proxy process through `stopped → starting → running ⇄ reloading`,
 * with `failed` reachable from starting, reloading and an unexpected exit.
 * Callers serialize operations; the supervisor does not queue them itself.
 */
export class ProxySupervisor {
  private readonly settings: SupervisorSettings;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: BoundLogger;
  private readonly onUnexpectedExit: ((exit: DaemonExit) => void) | undefined;

  private state: ProxyState = 'stopped';
  private process: DaemonProcess | null = null;
  private appliedVersion: string | null = null;
  private healthy = false;
  private lastError: string | null = null;
  private readonly retiring = new Set<DaemonProcess>();

  public constructor(
    private readonly daemon: ProxyDaemon,
    private readonly artifacts: ArtifactStore,
    options: SupervisorOptions = {}
  ) {
    const {now, sleep, logger, onUnexpectedExit, ...settings} = options;
    this.settings = SupervisorSettingsSchema.parse(settings);
    this.now = now ?? Date.now;
    this.sleep = sleep ?? defaultSleep;
    this.logger = (logger ?? createNoopLogger()).child({component: 'proxy.supervisor'});
    this.onUnexpectedExit = onUnexpectedExit;
  }

  public status(): ProxyProcessState {
    return {
      state: this.state,
      pid: this.process?.pid ?? null,
      appliedVersion: this.appliedVersion,
      healthy: this.healthy,
      lastError: this.lastError
    };
  }

  /** Starts the proxy when it is down or unhealthy, reloads it otherwise. */
  public async apply(artifact: ProxyArtifact): Promise<void> {
    if (this.state === 'starting' || this.state === 'reloading') {
      throw new SupervisorError('invalid_state', `Cannot apply while ${this.state}`);
    }

    if (this.state === 'running' && this.process && (await this.healthCheck())) {
      await this.reload(artifact);
      return;
    }

    await this.start(artifact);
  }

  public async start(artifact: ProxyArtifact): Promise<void> {
    if (this.state === 'starting' || this.state === 'reloading') {
      throw new SupervisorError('invalid_state', `Cannot start while ${this.state}`);
    }

    const previousState = this.state;
    await this.validateCandidate(artifact, () => {
      this.state = previousState;
    });

    if (this.process) {
      await this.retire(this.process);
      this.process = null;
    }

    this.state = 'starting';
    this.healthy = false;
    try {
      await this.artifacts.promoteCandidate();
    } catch (error) {
      await this.abandonCandidate(() => {
        this.state = 'failed';
      });
      this.lastError = describeError(error);
      this.logger.error({event: 'supervisor.start.failed', reason_code: 'promote_failed', metadata: {error}});
      throw new SupervisorError('startup_failed', `Could not activate the proxy configuration: ${this.lastError}`, {
        cause: error
      });
    }

    let lastFailure: unknown = null;
    for (let attempt = 0; attempt < this.settings.maxAttempts; attempt += 1) {
      if (attempt > 0) {
        await this.sleep(backoffDelayMs(this.settings.retryBackoffMs, attempt - 1));
      }

      this.logger.info({event: 'supervisor.start.attempt', metadata: {attempt: attempt + 1, version: artifact.version}});
      try {
        const process = await this.daemon.launch(this.artifacts.paths.active);
        if (await this.waitUntilHealthy(process, this.settings.readinessTimeoutMs)) {
          this.adopt(process, artifact.version);
          this.logger.info({event: 'supervisor.start.succeeded', metadata: {pid: process.pid, version: artifact.version}});
          return;
        }
        lastFailure = new Error('Proxy did not become ready in time');
        await this.retire(process);
      } catch (error) {
        lastFailure = error;
      }

      this.logger.warn({
        event: 'supervisor.start.attempt_failed',
        reason_code: 'not_ready',
        metadata: {attempt: attempt + 1, error: describeError(lastFailure)}
      });
    }

    await this.artifacts.restoreRollback();
    this.state = 'failed';
    this.lastError = describeError(lastFailure);
    this.logger.error({
      event: 'supervisor.start.failed',
      reason_code: 'startup_failed',
      metadata: {attempts: this.settings.maxAttempts, error: this.lastError}
    });
    throw new StartupError(this.settings.maxAttempts, {cause: lastFailure});
  }

  public async reload(artifact: ProxyArtifact): Promise<void> {
    const process = this.process;
    if (this.state !== 'running' || !process) {
      throw new SupervisorError('invalid_state', `Cannot reload while ${this.state}`);
    }

    this.state = 'reloading';
    const restoreRunning = () => {
      this.state = 'running';
    };
    await this.validateCandidate(artifact, restoreRunning);
    try {
      await this.artifacts.promoteCandidate();
    } catch (error) {
      await this.abandonCandidate(restoreRunning);
      this.logger.error({event: 'supervisor.reload.promote_failed', reason_code: 'reload_failed', metadata: {error}});
      throw new SupervisorError('reload_failed', `Could not activate the proxy configuration: ${describeError(error)}`, {
        cause: error
      });
    }

    const previousVersion = this.appliedVersion;
    for (let attempt = 0; attempt < this.settings.maxAttempts; attempt += 1) {
      if (attempt > 0) {
        await this.sleep(backoffDelayMs(this.settings.retryBackoffMs, attempt - 1));
      }

      if (await this.signalAndWait(process)) {
        this.appliedVersion = artifact.version;
        this.state = 'running';
        this.healthy = true;
        this.lastError = null;
        this.logger.info({
          event: 'supervisor.reload.succeeded',
          metadata: {version: artifact.version, previous_version: previousVersion, attempts: attempt + 1}
        });
        return;
      }

      this.logger.warn({event: 'supervisor.reload.attempt_failed', metadata: {attempt: attempt + 1}});
    }

    this.logger.warn({event: 'supervisor.reload.rollback', metadata: {restore_version: previousVersion}});
    const restored = await this.artifacts.restoreRollback();
    if (restored && (await this.signalAndWait(process))) {
      this.state = 'running';
      this.healthy = true;
      this.lastError = `Reload to ${artifact.version} failed; ${previousVersion ?? 'previous configuration'} restored`;
      throw new ReloadError({fatal: false, restoredVersion: previousVersion});
    }

    this.state = 'failed';
    this.healthy = false;
    this.lastError = 'Reload and rollback both failed';
    this.logger.fatal({event: 'supervisor.reload.fatal', reason_code: 'rollback_failed'});
    throw new ReloadError({fatal: true, restoredVersion: null});
  }

  /** Graceful stop escalating to a forced one; always ends `stopped`. */
  public async stop(): Promise<void> {
    const process = this.process;
    this.process = null;
    if (process) {
      await this.retire(process);
    }
    this.state = 'stopped';
    this.healthy = false;
    this.logger.info({event: 'supervisor.stop.completed'});
  }

  public async healthCheck(): Promise<boolean> {
    const process = this.process;
    this.healthy = process ? await this.probe(process) : false;
    return this.healthy;
  }

  public async purge(filter: CachePurgeFilter): Promise<number> {
    try {
      const purged = await this.daemon.purgeCache(this.process, filter);
      this.logger.info({event: 'supervisor.purge.completed', session_id: filter.sessionId, metadata: {purged}});
      return purged;
    } catch (error) {
      this.logger.error({
        event: 'supervisor.purge.failed',
        session_id: filter.sessionId,
        reason_code: 'upstream_failed',
        metadata: {error}
      });
      throw new UpstreamError(`Cache purge failed: ${describeError(error)}`, {cause: error});
    }
  }

  private async validateCandidate(artifact: ProxyArtifact, restoreState: () => void) {
    let validation: DaemonValidation;
    try {
      await this.artifacts.writeCandidate(artifact.text);
      validation = await this.daemon.validate(this.artifacts.paths.candidate);
    } catch (error) {
      await this.abandonCandidate(restoreState);
      this.logger.error({
        event: 'supervisor.config.check_failed',
        reason_code: 'upstream_failed',
        metadata: {version: artifact.version, error}
      });
      throw new UpstreamError(`Proxy configuration check failed: ${describeError(error)}`, {cause: error});
    }

    if (!validation.ok) {
      await this.abandonCandidate(restoreState);
      this.logger.error({
        event: 'supervisor.config.invalid',
        reason_code: 'config_invalid',
        metadata: {version: artifact.version, output: validation.output}
      });
      throw new ConfigInvalidError(validation.output);
    }
  }

  /** Restores the state before touching the disk. */
  private async abandonCandidate(restoreState: () => void) {
    restoreState();
    try {
      await this.artifacts.discardCandidate();
    } catch (error) {
      this.logger.warn({event: 'supervisor.candidate.discard_failed', metadata: {error}});
    }
  }

  private async signalAndWait(process: DaemonProcess) {
    try {
      await this.daemon.reload(process);
    } catch (error) {
      this.logger.warn({event: 'supervisor.reload.signal_failed', metadata: {error}});
      return false;
    }
    return this.waitUntilHealthy(process, this.settings.reloadTimeoutMs);
  }

  private async waitUntilHealthy(process: DaemonProcess, timeoutMs: number) {
    let exited = false;
    void process.exited.then(() => {
      exited = true;
    });

    return pollUntil({
      check: () => this.probe(process),
      timeoutMs,
      intervalMs: this.settings.healthPollIntervalMs,
      now: this.now,
      sleep: this.sleep,
      abandoned: () => exited || !process.isAlive()
    });
  }

  private async probe(process: DaemonProcess) {
    try {
      return await this.daemon.probe(process);
    } catch (error) {
      this.logger.debug({event: 'supervisor.probe.failed', metadata: {error}});
      return false;
    }
  }

  private adopt(process: DaemonProcess, version: string) {
    this.process = process;
    this.appliedVersion = version;
    this.state = 'running';
    this.healthy = true;
    this.lastError = null;

    void process.exited.then(exit => {
      if (this.retiring.has(process) || this.process !== process) {
        return;
      }
      this.process = null;
      this.state = 'failed';
      this.healthy = false;
      this.lastError = `Proxy exited unexpectedly (code ${exit.code ?? 'none'}, signal ${exit.signal ?? 'none'})`;
      this.logger.error({
        event: 'supervisor.process.exited',
        reason_code: 'unexpected_exit',
        metadata: {pid: process.pid, code: exit.code, signal: exit.signal, stderr: exit.stderr}
      });
      this.onUnexpectedExit?.(exit);
    });
  }

  private async retire(process: DaemonProcess) {
    this.retiring.add(process);
    try {
      await this.daemon.stop(process, {gracefulTimeoutMs: this.settings.shutdownTimeoutMs});
    } catch (error) {
      this.logger.error({event: 'supervisor.stop.failed', metadata: {pid: process.pid, error}});
    } finally {
      this.retiring.delete(process);
    }
  }
}
