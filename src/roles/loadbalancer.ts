/**
 * Load balancer: an nginx site in front of `backend_servers`, kept in sync
 * with a HealthChecker.
 */

import { ConfigError, errorMessage } from '../errors.js';
import { HealthChecker } from '../health/health-checker.js';
import { parseAddress } from '../health/probe.js';
import type { PoolSnapshot } from '../types.js';
import { parseDuration } from '../units.js';
import type { LoadBalancerConfig } from './schema.js';
import {
  PendingTasks,
  Rollback,
  checkDependencies,
  type RoleContext,
  type RoleContract,
  type RoleRuntime,
} from './common.js';
import { UpstreamSync, installSite, removeSite, renderSite, sitePaths } from './nginx.js';
import { log } from '../logger.js';

export interface HealthCheckTimings {
  intervalMs: number;
  timeoutMs: number;
}

export function healthCheckTimings(config: LoadBalancerConfig): HealthCheckTimings {
  const { interval, timeout } = config.health_check;
  const intervalMs = parseDuration(interval);
  if (intervalMs === null || intervalMs <= 0) {
    throw new ConfigError('E_CONFIG_INVALID', `health_check.interval: invalid duration "${interval}"`);
  }
  const timeoutMs = parseDuration(timeout);
  if (timeoutMs === null || timeoutMs <= 0) {
    throw new ConfigError('E_CONFIG_INVALID', `health_check.timeout: invalid duration "${timeout}"`);
  }
  if (timeoutMs > intervalMs) {
    throw new ConfigError('E_CONFIG_INVALID', `health_check.timeout (${timeout}) must not exceed interval (${interval})`);
  }
  return { intervalMs, timeoutMs };
}

export function validateBackends(backends: readonly string[]): void {
  if (backends.length === 0) {
    throw new ConfigError('E_CONFIG_INVALID', 'backend_servers must list at least one host:port target');
  }
  const seen = new Set<string>();
  for (const backend of backends) {
    if (!parseAddress(backend)) {
      throw new ConfigError('E_CONFIG_INVALID', `backend_servers: "${backend}" is not a host:port address`);
    }
    if (seen.has(backend)) {
      throw new ConfigError('E_CONFIG_INVALID', `backend_servers: "${backend}" is listed twice`);
    }
    seen.add(backend);
  }
}

function startHealthLoop(config: LoadBalancerConfig, ctx: RoleContext, sync: UpstreamSync): RoleRuntime {
  const { intervalMs, timeoutMs } = healthCheckTimings(config);
  const checker = new HealthChecker({
    targets: config.backend_servers,
    path: config.health_check.path,
    intervalMs,
    timeoutMs,
    unhealthyThreshold: config.health_check.retries,
    healthyThreshold: config.health_check.healthy_threshold,
    probe: ctx.probe,
  });

  const pending = new PendingTasks('LoadBalancer');
  let previous = checker.getSnapshot();
  pending.add('snapshot write', ctx.store.saveHealth('loadbalancer', previous));

  const unsubscribe = checker.subscribe((snapshot) => {
    pending.add('upstream reload', sync.update(snapshot.eligible));
    pending.add('snapshot write', ctx.store.saveHealth('loadbalancer', snapshot));
    reportTransitions(previous, snapshot, ctx, pending);
    previous = snapshot;
  });

  checker.start();

  return {
    healthChecker: checker,
    async stop() {
      unsubscribe();
      await checker.stop();
      await pending.drain();
      await ctx.store.saveHealth('loadbalancer', checker.getSnapshot());
    },
  };
}

function reportTransitions(
  before: PoolSnapshot,
  after: PoolSnapshot,
  ctx: RoleContext,
  pending: PendingTasks,
): void {
  for (const target of after.targets) {
    const old = before.targets.find(t => t.address === target.address);
    if (!old || old.state === target.state) continue;
    const down = target.state === 'UNHEALTHY';
    pending.add('event', ctx.events.publish({
      eventType: down ? 'BACKEND_DOWN' : 'BACKEND_UP',
      role: 'loadbalancer',
      severity: down ? 'WARNING' : 'INFO',
      subject: target.address,
      message: down ? target.lastError ?? 'probe failed' : 'recovered',
      details: { consecutiveFailures: target.consecutiveFailures, consecutiveSuccesses: target.consecutiveSuccesses },
    }));
  }

  if (after.degraded !== before.degraded) {
    const message = after.degraded
      ? `Load balancer degraded: every backend is UNHEALTHY, routing best-effort to ${after.eligible.join(', ')}`
      : `Load balancer recovered: ${after.eligible.length} healthy backend(s)`;
    pending.add('event', ctx.events.publish({
      eventType: after.degraded ? 'POOL_DEGRADED' : 'POOL_RECOVERED',
      role: 'loadbalancer',
      severity: after.degraded ? 'CRITICAL' : 'INFO',
      message,
      details: { eligible: [...after.eligible] },
    }));
    pending.add('notification', ctx.notify(message));
  }
}

export const loadBalancerRole: RoleContract<LoadBalancerConfig> = {
  async validate(config, ctx) {
    validateBackends(config.backend_servers);
    if (!config.health_check.path.startsWith('/')) {
      throw new ConfigError('E_CONFIG_INVALID', `health_check.path must start with "/" (got "${config.health_check.path}")`);
    }
    healthCheckTimings(config);
    await checkDependencies(config.dependencies, ctx);
  },

  async start(config, ctx) {
    const paths = sitePaths(ctx.settings.nginxRoot, config.site_name);
    const content = renderSite(config.backend_servers, config.port);
    const rollback = new Rollback();

    return rollback.guard(async () => {
      await installSite(paths, content, rollback);
      const instance = await ctx.supervisor.start('loadbalancer', {
        kind: 'service',
        unit: config.service_name,
        action: 'restart',
      });
      rollback.add(`${config.service_name} service`, async () => {
        await ctx.supervisor.stop('loadbalancer');
      });

      const sync = new UpstreamSync({
        file: paths.available,
        port: config.port,
        serviceName: config.service_name,
        runner: ctx.runner,
        initial: content,
      });
      const runtime = startHealthLoop(config, ctx, sync);

      return {
        instance,
        runtime,
        details: [
          `Load balancer listening on port ${config.port} (${config.service_name}, site ${paths.available})`,
          `Health checking ${config.backend_servers.length} backend(s) on ${config.health_check.path}`,
        ],
      };
    });
  },

  async stop(config, _instance, ctx) {
    const paths = sitePaths(ctx.settings.nginxRoot, config.site_name);
    try {
      await removeSite(paths);
    } catch (err) {
      log(`[LoadBalancer] Could not remove ${paths.available}: ${errorMessage(err)}`);
    }
    await ctx.store.clear('loadbalancer');
  },

  describe(config, ctx) {
    return [
      `Site: ${sitePaths(ctx.settings.nginxRoot, config.site_name).available}`,
      `Backends: ${config.backend_servers.join(', ')}`,
    ];
  },
};
