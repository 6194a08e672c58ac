/**
 * Process Supervisor
 *
 * Owns the single ServerInstance per role. Every status query goes to the
 * OS through the driver; the cached record is rewritten when the two
 * disagree.
 */

import { StartError, StopError, errorMessage } from '../errors.js';
import type { LaunchSpec, LifecycleStatus, Role, ServerInstance } from '../types.js';
import type { HandleDriver } from './drivers.js';
import { log } from '../logger.js';

export class ProcessSupervisor {
  private readonly instances = new Map<Role, ServerInstance>();

  constructor(private readonly driver: HandleDriver) {}

  private set(instance: Omit<ServerInstance, 'updatedAt'>): ServerInstance {
    const record: ServerInstance = Object.freeze({ ...instance, updatedAt: new Date().toISOString() });
    this.instances.set(record.role, record);
    return record;
  }

  /** Cached record, re-derived from the handle record when this process has none. */
  async locate(role: Role): Promise<ServerInstance | null> {
    const cached = this.instances.get(role);
    if (cached) return cached;

    const handle = await this.driver.discover(role);
    if (!handle) return null;
    return this.set({ role, handle, status: 'RUNNING' });
  }

  async start(role: Role, spec: LaunchSpec): Promise<ServerInstance> {
    if ((await this.status(role)) === 'RUNNING') {
      throw new StartError('E_ALREADY_RUNNING', `${role} is already running`);
    }

    this.set({ role, handle: null, status: 'STARTING' });
    try {
      const handle = await this.driver.launch(role, spec);
      const instance = this.set({ role, handle, status: 'RUNNING' });
      log(`[Supervisor] ${role} RUNNING`);
      return instance;
    } catch (err) {
      this.set({ role, handle: null, status: 'FAILED' });
      throw new StartError('E_RESOURCE_CREATE', `${role}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Stopping something that is not running succeeds without touching the OS. */
  async stop(role: Role): Promise<ServerInstance> {
    const instance = await this.locate(role);
    if (!instance?.handle) {
      return this.set({ role, handle: null, status: 'STOPPED' });
    }

    this.set({ ...instance, status: 'STOPPING' });
    try {
      await this.driver.terminate(instance.handle);
      await this.driver.release(role);
    } catch (err) {
      this.set({ ...instance, status: 'FAILED' });
      throw new StopError('E_STOP_FAILED', `${role}: ${errorMessage(err)}`, { cause: err });
    }

    log(`[Supervisor] ${role} STOPPED`);
    return this.set({ role, handle: null, status: 'STOPPED' });
  }

  async status(role: Role): Promise<LifecycleStatus> {
    const instance = await this.locate(role);
    if (!instance?.handle) return instance?.status ?? 'STOPPED';

    const alive = await this.driver.isAlive(instance.handle);
    if (alive && instance.status !== 'RUNNING') {
      this.set({ ...instance, status: 'RUNNING' });
      return 'RUNNING';
    }
    if (!alive && instance.status !== 'FAILED') {
      log(`[Supervisor] ${role} handle is gone, marking FAILED`);
      this.set({ ...instance, status: 'FAILED' });
      return 'FAILED';
    }
    return instance.status;
  }

  get(role: Role): ServerInstance | undefined {
    return this.instances.get(role);
  }
}
