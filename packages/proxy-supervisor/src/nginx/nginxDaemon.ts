import type {Dirent} from 'node:fs';
import {open, readdir, rm, type FileHandle} from 'node:fs/promises';
import {join} from 'node:path';
import {setTimeout as delay} from 'node:timers/promises';

import {createNoopLogger, type BoundLogger, type StructuredLogger} from '@hostplane/logging';

import type {CachePurgeFilter, DaemonProcess, DaemonValidation, ProxyDaemon} from '../contracts';
import {childProcessRunner, type CommandRunner} from './commandRunner';

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const CACHE_HEADER_BYTES = 4_096;
const CACHE_KEY_MARKER = '\nKEY: ';
const CACHE_KEY_SEPARATOR = ':u=';
const RAPID_START_WINDOW_MS = 10_000;
const PROBE_TIMEOUT_MS = 1_000;

export type NginxDaemonOptions = {
  binary?: string;
  errorLogPath?: string;
  cacheDir?: string;
  healthUrl?: string;
  runner?: CommandRunner;
  now?: () => number;
  fetchImpl?: typeof fetch;
  logger?: StructuredLogger;
};

export type CacheEntry = {
  file: string;
  sessionId: string;
  path: string;
};

/** Splits a cache key of the form `<sessionId>:u=<path>`. */
export const parseCacheKey = (key: string): {sessionId: string; path: string} | null => {
  const separator = key.indexOf(CACHE_KEY_SEPARATOR);
  if (separator <= 0) {
    return null;
  }
  return {sessionId: key.slice(0, separator), path: key.slice(separator + CACHE_KEY_SEPARATOR.length)};
};

/** Pulls the `KEY:` line out of the header of an nginx cache file. */
export const extractCacheKey = (header: string): string | null => {
  const start = header.indexOf(CACHE_KEY_MARKER);
  if (start < 0) {
    return null;
  }
  const end = header.indexOf('\n', start + CACHE_KEY_MARKER.length);
  if (end < 0) {
    return null;
  }
  return header.slice(start + CACHE_KEY_MARKER.length, end);
};

export const compilePurgeFilter = (filter: CachePurgeFilter) => {
  const anchored = filter.pattern === undefined ? null : new RegExp(`^(?:${filter.pattern})`, 'u');
  return (entry: {sessionId: string; path: string}) =>
    entry.sessionId === filter.sessionId && (anchored === null || anchored.test(entry.path));
};

const parseSupportedFlags = (help: string) =>
  new Set(
    help
      .split('\n')
      .map(line => line.trim())
      .map(line => /^(-[A-Za-z?])[\s,]/u.exec(line)?.[1])
      .filter((flag): flag is string => flag !== undefined)
  );

export class NginxDaemon implements ProxyDaemon {
  public readonly name = 'nginx';

  private readonly binary: string;
  private readonly errorLogPath: string | undefined;
  private readonly cacheDir: string | undefined;
  private readonly healthUrl: string | undefined;
  private readonly runner: CommandRunner;
  private readonly now: () => number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: BoundLogger;
  private readonly startTimes: number[] = [];
  private supportedFlags: Promise<Set<string>> | null = null;

  public constructor(options: NginxDaemonOptions = {}) {
    this.binary = options.binary ?? 'nginx';
    this.errorLogPath = options.errorLogPath;
    this.cacheDir = options.cacheDir;
    this.healthUrl = options.healthUrl;
    this.runner = options.runner ?? childProcessRunner;
    this.now = options.now ?? Date.now;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = (options.logger ?? createNoopLogger()).child({component: 'proxy.nginx'});
  }

  public async validate(configPath: string): Promise<DaemonValidation> {
    const result = await this.runner.run(this.binary, ['-t', ...(await this.errorLogArgs()), '-c', configPath]);
    if (result.code === 0) {
      return {ok: true};
    }
    return {ok: false, output: `${result.stderr}${result.stdout}`.trim()};
  }

  public async launch(configPath: string): Promise<DaemonProcess> {
    const args = [...(await this.errorLogArgs()), '-c', configPath, '-g', 'daemon off;'];
    this.startTimes.push(this.now());
    const process = await this.runner.start(this.binary, args);
    this.logger.info({event: 'nginx.process.launched', metadata: {pid: process.pid, config_path: configPath}});
    return process;
  }

  public async reload(process: DaemonProcess): Promise<void> {
    if (!process.signal('SIGHUP')) {
      throw new Error(`Could not signal nginx process ${process.pid}`);
    }
  }

  public async stop(process: DaemonProcess, {gracefulTimeoutMs}: {gracefulTimeoutMs: number}): Promise<void> {
    if (!process.isAlive()) {
      return;
    }

    process.signal('SIGQUIT');
    const timer = new AbortController();
    const graceful = await Promise.race([
      process.exited.then(() => true),
      delay(gracefulTimeoutMs, undefined, {signal: timer.signal}).then(
        () => false,
        () => false
      )
    ]);
    timer.abort();

    if (!graceful) {
      this.logger.warn({event: 'nginx.stop.forced', metadata: {pid: process.pid, graceful_timeout_ms: gracefulTimeoutMs}});
      process.signal('SIGKILL');
      await process.exited;
    }
  }

  public async probe(process: DaemonProcess): Promise<boolean> {
    if (!process.isAlive()) {
      return false;
    }
    if (!this.healthUrl) {
      return true;
    }

    try {
      const response = await this.fetchImpl(this.healthUrl, {signal: AbortSignal.timeout(PROBE_TIMEOUT_MS)});
      return response.status < 500;
    } catch {
      return false;
    }
  }

  public async purgeCache(process: DaemonProcess | null, filter: CachePurgeFilter): Promise<number> {
    if (!this.cacheDir) {
      return 0;
    }

    const matches = compilePurgeFilter(filter);
    const entries = await this.listCacheEntries(this.cacheDir);
    const doomed = entries.filter(matches);
    for (const entry of doomed) {
      await rm(entry.file, {force: true});
    }

    if (process?.isAlive()) {
      process.signal('SIGHUP');
    }
    return doomed.length;
  }

  /** Launches within the last ten seconds. */
  public rapidStarts(): number {
    const cutoff = this.now() - RAPID_START_WINDOW_MS;
    const recent = this.startTimes.filter(startedAt => startedAt >= cutoff);
    this.startTimes.splice(0, this.startTimes.length, ...recent);
    return recent.length;
  }

  private async errorLogArgs(): Promise<string[]> {
    if (!this.errorLogPath) {
      return [];
    }
    const flags = await this.flags();
    return flags.has('-e') ? ['-e', this.errorLogPath] : [];
  }

  private flags(): Promise<Set<string>> {
    if (!this.supportedFlags) {
      this.supportedFlags = this.runner
        .run(this.binary, ['-h'])
        .then(result => parseSupportedFlags(`${result.stdout}\n${result.stderr}`));
      void this.supportedFlags.catch(() => {
        this.supportedFlags = null;
      });
    }
    return this.supportedFlags;
  }

  private async listCacheEntries(directory: string): Promise<CacheEntry[]> {
    let children: Dirent[];
    try {
      children = await readdir(directory, {withFileTypes: true});
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const entries: CacheEntry[] = [];
    for (const child of children) {
      const file = join(directory, child.name);
      if (child.isDirectory()) {
        entries.push(...(await this.listCacheEntries(file)));
      } else if (child.isFile() || child.isSymbolicLink()) {
        const entry = await this.readCacheEntry(file);
        if (entry) {
          entries.push(entry);
        }
      }
    }
    return entries;
  }

  private async readCacheEntry(file: string): Promise<CacheEntry | null> {
    let handle: FileHandle;
    try {
      handle = await open(file, 'r');
    } catch (error) {
      // The cache manager evicts files while we scan.
      if (isMissingFileError(error)) {
        this.logger.debug({event: 'nginx.cache.entry_vanished', metadata: {file}});
        return null;
      }
      throw error;
    }

    try {
      const buffer = Buffer.alloc(CACHE_HEADER_BYTES);
      const {bytesRead} = await handle.read(buffer, 0, CACHE_HEADER_BYTES, 0);
      const key = extractCacheKey(buffer.subarray(0, bytesRead).toString('latin1'));
      const parsed = key === null ? null : parseCacheKey(key);
      if (!parsed) {
        this.logger.debug({event: 'nginx.cache.entry_unreadable', metadata: {file}});
        return null;
      }
      return {file, ...parsed};
    } finally {
      await handle.close();
    }
  }
}
