/**
 * OS-level handle drivers for the ProcessSupervisor.
 *
 *   process   detached child process, pid recorded in the state directory
 *   service   systemd unit via `systemctl` (local or over SSH)
 *   embedded  no process; alive while its backing file exists
 *
 * The handle record (`<stateDir>/<role>.handle.json`) is what lets a fresh
 * invocation find the instance a previous one started.
 */

import { spawn } from 'node:child_process';
import { existsSync, openSync, closeSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { CommandRunner } from '../services/runner.js';
import type { HandleRef, LaunchSpec, Role } from '../types.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

export interface HandleDriver {
  /** Bring the handle up. Must leave nothing behind when it throws. */
  launch(role: Role, spec: LaunchSpec): Promise<HandleRef>;
  /** Query the OS; never trust cached state. */
  isAlive(handle: HandleRef): Promise<boolean>;
  /** Take the handle down. Succeeds when it is already gone. */
  terminate(handle: HandleRef): Promise<void>;
  /** Re-derive the handle recorded by an earlier invocation. */
  discover(role: Role): Promise<HandleRef | null>;
  /** Forget the recorded handle. */
  release(role: Role): Promise<void>;
}

const HandleRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('process'), pid: z.number().int().positive(), command: z.string() }),
  z.object({ kind: z.literal('service'), unit: z.string().min(1) }),
  z.object({ kind: z.literal('embedded'), path: z.string().min(1) }),
]);

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Signal-0 liveness check; EPERM means the pid exists under another user. */
export function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

export interface SystemDriverOptions {
  stateDir: string;
  runner: CommandRunner;
  stopGraceMs: number;
  startupGraceMs: number;
}

export class SystemDriver implements HandleDriver {
  constructor(private readonly options: SystemDriverOptions) {}

  private handleFile(role: Role): string {
    return path.join(this.options.stateDir, `${role}.handle.json`);
  }

  private logFile(role: Role): string {
    return path.join(this.options.stateDir, `${role}.log`);
  }

  private async record(role: Role, handle: HandleRef): Promise<void> {
    await mkdir(this.options.stateDir, { recursive: true });
    await writeFile(this.handleFile(role), JSON.stringify(handle) + '\n');
  }

  async launch(role: Role, spec: LaunchSpec): Promise<HandleRef> {
    await mkdir(this.options.stateDir, { recursive: true });

    let handle: HandleRef;
    switch (spec.kind) {
      case 'process':
        handle = await this.spawnProcess(role, spec);
        break;
      case 'service':
        handle = await this.startService(spec.unit, spec.action);
        break;
      case 'embedded':
        if (!existsSync(spec.path)) throw new Error(`${spec.path} does not exist`);
        handle = { kind: 'embedded', path: spec.path };
        break;
    }

    try {
      await this.record(role, handle);
    } catch (err) {
      await this.terminate(handle);
      throw err;
    }
    return handle;
  }

  private async spawnProcess(
    role: Role,
    spec: Extract<LaunchSpec, { kind: 'process' }>,
  ): Promise<HandleRef> {
    const out = openSync(this.logFile(role), 'a');
    try {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: spec.env,
        detached: true,
        stdio: ['ignore', out, out],
      });

      const pid = await new Promise<number>((resolve, reject) => {
        child.once('error', reject);
        child.once('spawn', () => {
          if (child.pid === undefined) reject(new Error(`${spec.command} has no pid`));
          else resolve(child.pid);
        });
      });

      let exitCode: number | null = null;
      child.once('exit', (code) => { exitCode = code ?? -1; });
      child.unref();

      // A process that dies right away never counts as started
      await sleep(this.options.startupGraceMs);
      if (exitCode !== null || !pidAlive(pid)) {
        throw new Error(`${spec.command} exited during startup (code ${exitCode ?? 'unknown'}), see ${this.logFile(role)}`);
      }

      log(`[Supervisor] Spawned ${spec.command} (pid ${pid}) for ${role}`);
      return { kind: 'process', pid, command: spec.command };
    } finally {
      closeSync(out);
    }
  }

  private async startService(unit: string, action: 'start' | 'restart'): Promise<HandleRef> {
    const result = await this.options.runner.run('systemctl', [action, unit]);
    if (result.code !== 0) {
      throw new Error(`systemctl ${action} ${unit} on ${this.options.runner.target} failed: ${result.stderr || `exit ${result.code}`}`);
    }
    log(`[Supervisor] systemctl ${action} ${unit} on ${this.options.runner.target}`);
    return { kind: 'service', unit };
  }

  async isAlive(handle: HandleRef): Promise<boolean> {
    switch (handle.kind) {
      case 'process':
        return pidAlive(handle.pid);
      case 'service': {
        const result = await this.options.runner.run('systemctl', ['is-active', '--quiet', handle.unit]);
        return result.code === 0;
      }
      case 'embedded':
        return existsSync(handle.path);
    }
  }

  async terminate(handle: HandleRef): Promise<void> {
    switch (handle.kind) {
      case 'process':
        await this.killProcess(handle.pid);
        return;
      case 'service': {
        const result = await this.options.runner.run('systemctl', ['stop', handle.unit]);
        if (result.code !== 0) {
          throw new Error(`systemctl stop ${handle.unit} failed: ${result.stderr || `exit ${result.code}`}`);
        }
        return;
      }
      case 'embedded':
        // Data stays on disk; releasing the handle record is enough
        return;
    }
  }

  private async killProcess(pid: number): Promise<void> {
    if (!pidAlive(pid)) return;

    // Detached children lead their own process group
    signal(pid, 'SIGTERM');
    const deadline = Date.now() + this.options.stopGraceMs;
    while (Date.now() < deadline) {
      if (!pidAlive(pid)) return;
      await sleep(100);
    }

    log(`[Supervisor] pid ${pid} ignored SIGTERM for ${this.options.stopGraceMs}ms, sending SIGKILL`);
    signal(pid, 'SIGKILL');
    await sleep(100);
    if (pidAlive(pid)) throw new Error(`pid ${pid} survived SIGKILL`);
  }

  async discover(role: Role): Promise<HandleRef | null> {
    let raw: string;
    try {
      raw = await readFile(this.handleFile(role), 'utf8');
    } catch {
      return null;
    }
    try {
      const parsed = HandleRefSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
    } catch (err) {
      log(`[Supervisor] Ignoring unreadable handle record for ${role}: ${errorMessage(err)}`);
      return null;
    }
    log(`[Supervisor] Ignoring malformed handle record for ${role}`);
    return null;
  }

  async release(role: Role): Promise<void> {
    await rm(this.handleFile(role), { force: true });
  }
}

function signal(pid: number, sig: NodeJS.Signals): void {
  try {
    process.kill(-pid, sig);
  } catch {
    // Not a group leader (or already gone); signal the pid itself
    try {
      process.kill(pid, sig);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) throw err;
    }
  }
}
