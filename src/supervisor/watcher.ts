/**
 * Foreground watcher pid files.
 *
 * A loop-owning role started in the foreground records the CLI's own pid as
 * `<stateDir>/<role>.watcher.pid`. A `stop` from another invocation signals
 * that pid so the loops shut down in the process that owns them.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Role } from '../types.js';
import { pidAlive } from './drivers.js';
import { log } from '../logger.js';

function watcherFile(stateDir: string, role: Role): string {
  return path.join(stateDir, `${role}.watcher.pid`);
}

export async function readWatcher(stateDir: string, role: Role): Promise<number | null> {
  let raw: string;
  try {
    raw = await readFile(watcherFile(stateDir, role), 'utf8');
  } catch {
    return null;
  }
  const pid = parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

export async function claimWatcher(stateDir: string, role: Role, pid = process.pid): Promise<void> {
  await mkdir(stateDir, { recursive: true });
  await writeFile(watcherFile(stateDir, role), `${pid}\n`);
}

/** Removes the pid file, but only if it still names `pid`. */
export async function releaseWatcher(stateDir: string, role: Role, pid = process.pid): Promise<void> {
  if ((await readWatcher(stateDir, role)) !== pid) return;
  await rm(watcherFile(stateDir, role), { force: true });
}

/**
 * SIGTERM the foreground watcher of `role`, if another live process holds
 * it, and wait up to `graceMs` for it to exit. Returns true when a watcher
 * was signalled.
 */
export async function signalWatcher(stateDir: string, role: Role, graceMs: number): Promise<boolean> {
  const pid = await readWatcher(stateDir, role);
  if (pid === null || pid === process.pid) return false;

  if (!pidAlive(pid)) {
    await rm(watcherFile(stateDir, role), { force: true });
    return false;
  }

  log(`[Orchestrator] Signalling ${role} watcher (pid ${pid})`);
  process.kill(pid, 'SIGTERM');

  const deadline = Date.now() + graceMs;
  while (Date.now() < deadline && pidAlive(pid)) {
    await new Promise(resolve => setTimeout(resolve, 100));
  }
  if (pidAlive(pid)) log(`[Orchestrator] ${role} watcher (pid ${pid}) still running after ${graceMs}ms`);
  return true;
}
