import type {StructuredLogger} from '@hostplane/logging';
import {z} from 'zod';

export const proxyStates = ['stopped', 'starting', 'running', 'reloading', 'failed'] as const;

export type ProxyState = (typeof proxyStates)[number];

export type ProxyProcessState = {
  state: ProxyState;
  pid: number | null;
  appliedVersion: string | null;
  healthy: boolean;
  lastError: string | null;
};

export type DaemonExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
};

/** Handle on a launched proxy process. `exited` resolves once and never rejects. */
export type DaemonProcess = {
  pid: number;
  exited: Promise<DaemonExit>;
  signal: (signal: NodeJS.Signals) => boolean;
  isAlive: () => boolean;
};

export type DaemonValidation = {ok: true} | {ok: false; output: string};

export type CachePurgeFilter = {
  sessionId: string;
  pattern?: string;
};

/**
 * Process-control capability of a proxy. The supervisor drives any
 * implementation through these operations only.
 */
export type ProxyDaemon = {
  readonly name: string;
  validate: (configPath: string) => Promise<DaemonValidation>;
  launch: (configPath: string) => Promise<DaemonProcess>;
  reload: (process: DaemonProcess) => Promise<void>;
  stop: (process: DaemonProcess, options: {gracefulTimeoutMs: number}) => Promise<void>;
  probe: (process: DaemonProcess) => Promise<boolean>;
  purgeCache: (process: DaemonProcess | null, filter: CachePurgeFilter) => Promise<number>;
};

export type ProxyArtifact = {
  text: string;
  version: string;
};

export const SupervisorSettingsSchema = z
  .object({
    readinessTimeoutMs: z.number().int().min(1).max(300_000).default(5_000),
    reloadTimeoutMs: z.number().int().min(1).max(300_000).default(5_000),
    shutdownTimeoutMs: z.number().int().min(1).max(300_000).default(10_000),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    retryBackoffMs: z.number().int().min(0).max(60_000).default(200),
    healthPollIntervalMs: z.number().int().min(1).max(10_000).default(100)
  })
  .strict();

export type SupervisorSettings = z.infer<typeof SupervisorSettingsSchema>;

export type SupervisorOptions = Partial<SupervisorSettings> & {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
  onUnexpectedExit?: (exit: DaemonExit) => void;
};
