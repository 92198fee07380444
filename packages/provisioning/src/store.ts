import {
  ConfigGenerationError,
  generateProxyConfiguration,
  matchStaticRoute,
  type GeneratorOptionsInput,
  type ProxyConfigurationArtifact,
  type StaticRoute
} from '@hostplane/config-generator';
import {createNoopLogger, runWithLogContext, type BoundLogger, type StructuredLogger} from '@hostplane/logging';
import type {ProxyProcessState, ProxySupervisor} from '@hostplane/proxy-supervisor';
import {RedirectTableError, type RedirectResolution, type RedirectTable} from '@hostplane/redirect-table';
import {
  CertificateIdSchema,
  CertificateMaterialSchema,
  ContentHostingConfigurationSchema,
  ProvisioningSessionIdSchema,
  type ContentHostingConfiguration,
  type ProvisioningSession
} from '@hostplane/schemas';
import type {ZodType} from 'zod';

import type {CertificateCache} from './certificateCache';
import {ConflictError, InUseError, NotFoundError, ValidationError} from './errors';
import {SerialQueue} from './serialQueue';
import {findRecordIssues, findStateIssues} from './validation';

export type ProvisioningSupervisor = Pick<ProxySupervisor, 'apply' | 'stop' | 'purge' | 'status'>;

export type ProvisioningStoreOptions = {
  supervisor: ProvisioningSupervisor;
  redirects: RedirectTable;
  certificates: CertificateCache;
  generatorOptions?: GeneratorOptionsInput;
  logger?: StructuredLogger;
  now?: () => number;
};

export type PutExpectation = 'absent' | 'present';

export type PutResult = {
  changed: boolean;
  created: boolean;
};

export type ProvisioningSnapshot = {
  sessions: ProvisioningSession[];
  certificateIds: string[];
  appliedVersion: string | null;
  proxy: ProxyProcessState;
};

type SessionMap = ReadonlyMap<string, ContentHostingConfiguration>;

type MutationFields = {
  session_id?: string;
  certificate_id?: string;
};

const stableStringify = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const fields = Object.entries(value)
      .filter(([, field]) => field !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, field]) => `${JSON.stringify(key)}:${stableStringify(field)}`);
    return `{${fields.join(',')}}`;
  }
  return JSON.stringify(value);
};

const pathPrefixesOf = (configuration: ContentHostingConfiguration) =>
  new Set(configuration.distributionConfigurations.map(distribution => distribution.pathPrefix));

const reasonCodeOf = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'unexpected_error';

const describeFailure = (error: unknown) => (error instanceof Error ? error.message : String(error));

const parseIdentifier = (schema: ZodType<string>, value: string) => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod('invalid_identifier', parsed.error);
  }
  return parsed.data;
};

/**
 * Owns the provisioning state. Every mutation builds a candidate state, turns
 * it into a proxy configuration and hands that to the supervisor; the candidate
 * becomes visible only once the proxy runs it. Mutations run one at a time in
 * submission order, reads see the last committed state.
 */
export class ProvisioningStore {
  private readonly supervisor: ProvisioningSupervisor;
  private readonly redirects: RedirectTable;
  private readonly certificates: CertificateCache;
  private readonly generatorOptions: GeneratorOptionsInput | undefined;
  private readonly logger: BoundLogger;
  private readonly now: () => number;
  private readonly queue = new SerialQueue();

  private sessions: SessionMap = new Map();
  private routes: StaticRoute[] = [];
  private appliedVersion: string | null = null;

  public constructor(options: ProvisioningStoreOptions) {
    this.supervisor = options.supervisor;
    this.redirects = options.redirects;
    this.certificates = options.certificates;
    this.generatorOptions = options.generatorOptions;
    this.logger = (options.logger ?? createNoopLogger()).child({component: 'provisioning.store'});
    this.now = options.now ?? Date.now;
  }

  /** Loads cached certificates and brings the proxy up on the current state. */
  public start(): Promise<void> {
    return this.mutate('start', {}, async () => {
      await this.certificates.load();
      const artifact = await this.applyState(this.sessions);
      this.commit(this.sessions, artifact);
    });
  }

  /** Regenerates and re-applies the committed state, e.g. after the proxy died. */
  public reapply(): Promise<void> {
    return this.mutate('reapply', {}, async () => {
      const artifact = await this.applyState(this.sessions);
      this.commit(this.sessions, artifact);
    });
  }

  public async shutdown(): Promise<void> {
    await this.queue.drain();
    await this.supervisor.stop();
    this.logger.info({event: 'provisioning.shutdown.completed'});
  }

  public put(sessionId: string, record: unknown, {expect}: {expect?: PutExpectation} = {}): Promise<PutResult> {
    return this.mutate('put', {session_id: sessionId}, async () => {
      const id = parseIdentifier(ProvisioningSessionIdSchema, sessionId);
      const parsed = ContentHostingConfigurationSchema.safeParse(record);
      if (!parsed.success) {
        throw ValidationError.fromZod('invalid_record', parsed.error);
      }
      const configuration = parsed.data;

      const existing = this.sessions.get(id);
      if (expect === 'absent' && existing) {
        throw new ConflictError('session', id);
      }
      if (expect === 'present' && !existing) {
        throw new NotFoundError('session', id);
      }

      const recordIssues = findRecordIssues(configuration);
      if (recordIssues.length > 0) {
        throw new ValidationError('invalid_record', recordIssues);
      }

      if (existing && stableStringify(existing) === stableStringify(configuration)) {
        return {changed: false, created: false};
      }

      const candidate = new Map(this.sessions);
      candidate.set(id, configuration);
      const stateIssues = findStateIssues({
        sessions: candidate,
        sessionId: id,
        hasCertificate: certificateId => this.certificates.has(certificateId)
      });
      if (stateIssues.length > 0) {
        throw new ValidationError('invalid_record', stateIssues);
      }

      const artifact = await this.applyState(candidate);
      this.commit(candidate, artifact);

      if (existing) {
        const kept = pathPrefixesOf(configuration);
        for (const prefix of pathPrefixesOf(existing)) {
          if (!kept.has(prefix)) {
            this.redirects.flush(prefix);
          }
        }
      }

      return {changed: true, created: !existing};
    });
  }

  public delete(sessionId: string): Promise<void> {
    return this.mutate('delete', {session_id: sessionId}, async () => {
      const existing = this.sessions.get(sessionId);
      if (!existing) {
        throw new NotFoundError('session', sessionId);
      }

      const candidate = new Map(this.sessions);
      candidate.delete(sessionId);
      const artifact = await this.applyState(candidate);
      this.commit(candidate, artifact);

      let flushed = 0;
      for (const prefix of pathPrefixesOf(existing)) {
        flushed += this.redirects.flush(prefix);
      }

      try {
        await this.supervisor.purge({sessionId});
      } catch (error) {
        this.logger.warn({
          event: 'provisioning.delete.purge_failed',
          session_id: sessionId,
          reason_code: reasonCodeOf(error),
          metadata: {error: describeFailure(error)}
        });
      }

      this.logger.debug({event: 'provisioning.delete.redirects_flushed', session_id: sessionId, metadata: {flushed}});
    });
  }

  public purge(sessionId: string, {pattern}: {pattern?: string} = {}): Promise<number> {
    return this.mutate('purge', {session_id: sessionId}, async () => {
      if (!this.sessions.has(sessionId)) {
        throw new NotFoundError('session', sessionId);
      }

      if (pattern === undefined) {
        return this.supervisor.purge({sessionId});
      }

      try {
        new RegExp(pattern, 'u');
      } catch (error) {
        throw new ValidationError('invalid_pattern', [`pattern: ${describeFailure(error)}`]);
      }
      return this.supervisor.purge({sessionId, pattern});
    });
  }

  public putCertificate(
    certificateId: string,
    material: unknown,
    {expect}: {expect?: PutExpectation} = {}
  ): Promise<PutResult> {
    return this.mutate('certificate_put', {certificate_id: certificateId}, async () => {
      const id = parseIdentifier(CertificateIdSchema, certificateId);
      const parsed = CertificateMaterialSchema.safeParse(material);
      if (!parsed.success) {
        throw ValidationError.fromZod('invalid_certificate', parsed.error);
      }

      const exists = this.certificates.has(id);
      if (expect === 'absent' && exists) {
        throw new ConflictError('certificate', id);
      }
      if (expect === 'present' && !exists) {
        throw new NotFoundError('certificate', id);
      }

      const previous = exists ? await this.certificates.read(id) : null;
      if (previous === parsed.data) {
        return {changed: false, created: false};
      }

      await this.certificates.write(id, parsed.data);
      if (this.sessionsReferencing(id).length === 0) {
        return {changed: true, created: !exists};
      }

      try {
        const artifact = await this.applyState(this.sessions);
        this.commit(this.sessions, artifact);
      } catch (error) {
        if (previous === null) {
          await this.certificates.remove(id);
        } else {
          await this.certificates.write(id, previous);
        }
        throw error;
      }
      return {changed: true, created: !exists};
    });
  }

  public deleteCertificate(certificateId: string): Promise<void> {
    return this.mutate('certificate_delete', {certificate_id: certificateId}, async () => {
      if (!this.certificates.has(certificateId)) {
        throw new NotFoundError('certificate', certificateId);
      }
      const referencing = this.sessionsReferencing(certificateId);
      if (referencing.length > 0) {
        throw new InUseError(certificateId, referencing);
      }
      await this.certificates.remove(certificateId);
    });
  }

  public getSession(sessionId: string): ContentHostingConfiguration | null {
    return this.sessions.get(sessionId) ?? null;
  }

  public listSessionIds(): string[] {
    return [...this.sessions.keys()].sort();
  }

  public listCertificateIds(): string[] {
    return this.certificates.ids();
  }

  public hasCertificate(certificateId: string): boolean {
    return this.certificates.has(certificateId);
  }

  public snapshot(): ProvisioningSnapshot {
    return {
      sessions: this.listSessionIds().flatMap(sessionId => {
        const configuration = this.sessions.get(sessionId);
        return configuration ? [{sessionId, configuration}] : [];
      }),
      certificateIds: this.certificates.ids(),
      appliedVersion: this.appliedVersion,
      proxy: this.supervisor.status()
    };
  }

  public routingTable(): StaticRoute[] {
    return [...this.routes];
  }

  /** Live redirects first, then the static routes of the applied configuration. */
  public resolvePath(path: string, {host}: {host?: string} = {}): RedirectResolution {
    const match = matchStaticRoute(this.routes, path, host === undefined ? {} : {host});
    try {
      return this.redirects.resolve(
        path,
        match ? {upstream: match.upstream, remainder: match.remainder} : {upstream: null, remainder: path}
      );
    } catch (error) {
      if (error instanceof RedirectTableError) {
        throw new ValidationError('invalid_redirect', [error.message]);
      }
      throw error;
    }
  }

  /** Mints a redirect under one of the applied path prefixes. */
  public allocateRedirect(sessionPrefix: string, upstreamPrefix: string): string {
    if (!this.routes.some(route => route.pathPrefix === sessionPrefix)) {
      throw new NotFoundError('route', sessionPrefix);
    }
    try {
      return this.redirects.allocate(sessionPrefix, upstreamPrefix);
    } catch (error) {
      if (error instanceof RedirectTableError) {
        throw new ValidationError('invalid_redirect', [error.message]);
      }
      throw error;
    }
  }

  private sessionsReferencing(certificateId: string): string[] {
    return [...this.sessions.entries()]
      .filter(([, configuration]) =>
        configuration.distributionConfigurations.some(distribution => distribution.certificateId === certificateId)
      )
      .map(([sessionId]) => sessionId)
      .sort();
  }

  private async applyState(sessions: SessionMap): Promise<ProxyConfigurationArtifact> {
    let artifact: ProxyConfigurationArtifact;
    try {
      artifact = generateProxyConfiguration({
        sessions: [...sessions.keys()].sort().flatMap(sessionId => {
          const configuration = sessions.get(sessionId);
          return configuration ? [{sessionId, configuration}] : [];
        }),
        certificatePaths: this.certificates.paths(),
        ...(this.generatorOptions === undefined ? {} : {options: this.generatorOptions})
      });
    } catch (error) {
      if (error instanceof ConfigGenerationError) {
        throw new ValidationError('invalid_record', [error.message]);
      }
      throw error;
    }

    await this.supervisor.apply({text: artifact.text, version: artifact.version});
    return artifact;
  }

  private commit(sessions: SessionMap, artifact: ProxyConfigurationArtifact) {
    this.sessions = sessions;
    this.routes = artifact.routes;
    this.appliedVersion = artifact.version;
  }

  private mutate<T>(operation: string, fields: MutationFields, task: () => Promise<T>): Promise<T> {
    const scope = {
      ...(fields.session_id ? {session_id: fields.session_id} : {}),
      ...(fields.certificate_id ? {certificate_id: fields.certificate_id} : {})
    };
    return this.queue.run(async () => {
      const startedAt = this.now();
      try {
        const result = await runWithLogContext(scope, task);
        this.logger.info({
          event: `provisioning.${operation}.completed`,
          ...fields,
          duration_ms: Math.max(0, Math.round(this.now() - startedAt)),
          metadata: {applied_version: this.appliedVersion}
        });
        return result;
      } catch (error) {
        this.logger.warn({
          event: `provisioning.${operation}.failed`,
          ...fields,
          reason_code: reasonCodeOf(error),
          duration_ms: Math.max(0, Math.round(this.now() - startedAt)),
          metadata: {error: describeFailure(error)}
        });
        throw error;
      }
    });
  }
}
