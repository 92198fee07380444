import {readFile} from 'node:fs/promises';

import type {CachePurgeFilter, DaemonExit, DaemonProcess, DaemonValidation, ProxyDaemon} from '../contracts';

export class MemoryDaemonProcess implements DaemonProcess {
  public readonly exited: Promise<DaemonExit>;
  public readonly signals: NodeJS.Signals[] = [];
  public healthy: boolean;
  private alive = true;
  private resolveExit: (exit: DaemonExit) => void = () => undefined;

  public constructor(
    public readonly pid: number,
    healthy: boolean
  ) {
    this.healthy = healthy;
    this.exited = new Promise<DaemonExit>(resolve => {
      this.resolveExit = resolve;
    });
  }

  public signal(signal: NodeJS.Signals) {
    if (!this.alive) {
      return false;
    }
    this.signals.push(signal);
    return true;
  }

  public isAlive() {
    return this.alive;
  }

  public exit({code = 0, signal = null}: {code?: number | null; signal?: NodeJS.Signals | null} = {}) {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.resolveExit({code, signal, stderr: ''});
  }
}

export type MemoryDaemonOptions = {
  rejectConfig?: (text: string) => string | null;
  launchOutcomes?: boolean[];
  reloadOutcomes?: boolean[];
  purgeResult?: number | Error;
};

/**
 * Proxy daemon that keeps everything in process. It reads the configuration
 * it is pointed at and reports scripted outcomes, for development without a
 * proxy binary and for exercising the supervisor.
 */
export class MemoryDaemon implements ProxyDaemon {
  public readonly name = 'memory';
  public readonly processes: MemoryDaemonProcess[] = [];
  public readonly validated: string[] = [];
  public readonly loaded: string[] = [];
  public readonly purges: CachePurgeFilter[] = [];

  private readonly rejectConfig: (text: string) => string | null;
  private readonly launchOutcomes: boolean[];
  private readonly reloadOutcomes: boolean[];
  private purgeResult: number | Error;
  private nextPid = 1_000;
  private configPath: string | null = null;

  public constructor(options: MemoryDaemonOptions = {}) {
    this.rejectConfig = options.rejectConfig ?? (() => null);
    this.launchOutcomes = [...(options.launchOutcomes ?? [])];
    this.reloadOutcomes = [...(options.reloadOutcomes ?? [])];
    this.purgeResult = options.purgeResult ?? 0;
  }

  public scriptLaunches(...outcomes: boolean[]) {
    this.launchOutcomes.push(...outcomes);
  }

  public scriptReloads(...outcomes: boolean[]) {
    this.reloadOutcomes.push(...outcomes);
  }

  public setPurgeResult(result: number | Error) {
    this.purgeResult = result;
  }

  public get current(): MemoryDaemonProcess | undefined {
    return this.processes.at(-1);
  }

  public async validate(configPath: string): Promise<DaemonValidation> {
    const text = await readFile(configPath, 'utf8');
    this.validated.push(text);
    const problem = this.rejectConfig(text);
    return problem === null ? {ok: true} : {ok: false, output: problem};
  }

  public async launch(configPath: string): Promise<DaemonProcess> {
    this.configPath = configPath;
    this.loaded.push(await readFile(configPath, 'utf8'));
    this.nextPid += 1;
    const process = new MemoryDaemonProcess(this.nextPid, this.launchOutcomes.shift() ?? true);
    this.processes.push(process);
    return process;
  }

  public async reload(process: DaemonProcess): Promise<void> {
    const target = this.find(process);
    if (!target.signal('SIGHUP')) {
      throw new Error(`Process ${process.pid} is not running`);
    }
    if (this.configPath) {
      this.loaded.push(await readFile(this.configPath, 'utf8'));
    }
    target.healthy = this.reloadOutcomes.shift() ?? true;
  }

  public async stop(process: DaemonProcess): Promise<void> {
    const target = this.find(process);
    target.signal('SIGQUIT');
    target.exit({code: 0});
  }

  public async probe(process: DaemonProcess): Promise<boolean> {
    const target = this.find(process);
    return target.isAlive() && target.healthy;
  }

  public async purgeCache(_process: DaemonProcess | null, filter: CachePurgeFilter): Promise<number> {
    this.purges.push(filter);
    if (this.purgeResult instanceof Error) {
      throw this.purgeResult;
    }
    return this.purgeResult;
  }

  private find(process: DaemonProcess): MemoryDaemonProcess {
    const target = this.processes.find(candidate => candidate.pid === process.pid);
    if (!target) {
      throw new Error(`Unknown process ${process.pid}`);
    }
    return target;
  }
}
