import {spawn} from 'node:child_process';

import type {DaemonExit, DaemonProcess} from '../contracts';

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type CommandRunner = {
  run: (command: string, args: readonly string[]) => Promise<CommandResult>;
  start: (command: string, args: readonly string[]) => Promise<DaemonProcess>;
};

const STDERR_TAIL_BYTES = 8_192;

const run: CommandRunner['run'] = (command, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {stdio: ['ignore', 'pipe', 'pipe']});
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.once('error', reject);
    child.once('close', code => resolve({code, stdout, stderr}));
  });

const start: CommandRunner['start'] = (command, args) =>
  new Promise<DaemonProcess>((resolve, reject) => {
    const child = spawn(command, [...args], {stdio: ['ignore', 'ignore', 'pipe']});
    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = `${stderr}${chunk}`.slice(-STDERR_TAIL_BYTES);
    });

    const exited = new Promise<DaemonExit>(resolveExit => {
      child.once('close', (code, signal) => resolveExit({code, signal, stderr}));
    });

    child.once('error', reject);
    child.once('spawn', () => {
      const pid = child.pid;
      if (pid === undefined) {
        reject(new Error(`${command} started without a pid`));
        return;
      }
      resolve({
        pid,
        exited,
        signal: signal => child.kill(signal),
        isAlive: () => child.exitCode === null && child.signalCode === null
      });
    });
  });

export const childProcessRunner: CommandRunner = {run, start};
