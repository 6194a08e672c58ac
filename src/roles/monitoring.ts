/**
 * Monitoring role: Prometheus (plus optional Grafana) and an AlertEvaluator
 * over the `/metrics` endpoints of the monitored targets.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { AlertEvaluator } from '../alerts/evaluator.js';
import { compileRules } from '../alerts/rules.js';
import { ConfigError, StartError, errorMessage } from '../errors.js';
import { parseAddress } from '../health/probe.js';
import type { AlertTransition } from '../types.js';
import { formatDuration } from '../units.js';
import type { MonitoringConfig } from './schema.js';
import {
  PendingTasks,
  Rollback,
  checkDependencies,
  checkPortFree,
  launchEnv,
  type RoleContext,
  type RoleContract,
  type RoleRuntime,
} from './common.js';
import { renderPrometheusConfig } from './prometheus.js';
import { log } from '../logger.js';

const GRAFANA_UNIT = 'grafana-server';

export function prometheusPaths(appDir: string): { config: string; data: string } {
  return {
    config: path.join(appDir, 'prometheus.yml'),
    data: path.join(appDir, 'prometheus_data'),
  };
}

export function prometheusArgs(config: MonitoringConfig, appDir: string): string[] {
  const paths = prometheusPaths(appDir);
  return [
    `--config.file=${paths.config}`,
    `--storage.tsdb.path=${paths.data}`,
    `--web.listen-address=0.0.0.0:${config.port}`,
  ];
}

function startAlertLoop(config: MonitoringConfig, ctx: RoleContext): RoleRuntime {
  const evaluator = new AlertEvaluator({
    rules: compileRules(config.alert_rules),
    source: ctx.metricsSource(config.targets),
    intervalMs: ctx.settings.evaluationIntervalSeconds * 1000,
  });

  const pending = new PendingTasks('Alerts');
  pending.add('snapshot write', ctx.store.saveAlerts('monitoring', evaluator.getSnapshot()));

  const unsubscribe = evaluator.subscribe((transition, snapshot) => {
    pending.add('snapshot write', ctx.store.saveAlerts('monitoring', snapshot));
    reportTransition(transition, ctx, pending);
  });

  evaluator.start();

  return {
    alertEvaluator: evaluator,
    async stop() {
      unsubscribe();
      await evaluator.stop();
      await pending.drain();
      await ctx.store.saveAlerts('monitoring', evaluator.getSnapshot());
    },
  };
}

function reportTransition(transition: AlertTransition, ctx: RoleContext, pending: PendingTasks): void {
  if (transition.to !== 'FIRING' && transition.to !== 'RESOLVED') return;

  const firing = transition.to === 'FIRING';
  const value = transition.value === null ? 'n/a' : String(Math.round(transition.value * 10_000) / 10_000);
  const message = firing
    ? `Alert ${transition.rule} FIRING (value ${value})`
    : `Alert ${transition.rule} RESOLVED (value ${value})`;

  pending.add('event', ctx.events.publish({
    eventType: firing ? 'ALERT_FIRING' : 'ALERT_RESOLVED',
    role: 'monitoring',
    severity: firing ? 'CRITICAL' : 'INFO',
    subject: transition.rule,
    message,
    details: { from: transition.from, to: transition.to, value: transition.value, at: transition.at },
  }));
  pending.add('notification', ctx.notify(message));
}

async function writeTracked(file: string, content: string, rollback: Rollback): Promise<void> {
  const previous = existsSync(file) ? await readFile(file, 'utf8') : null;
  await writeFile(file, content);
  rollback.add(`file ${file}`, async () => {
    if (previous === null) await rm(file, { force: true });
    else await writeFile(file, previous);
  });
}

export const monitoringRole: RoleContract<MonitoringConfig> = {
  async validate(config, ctx) {
    if (config.monitoring_type.toLowerCase() !== 'prometheus') {
      throw new ConfigError('E_CONFIG_INVALID', `unsupported monitoring_type "${config.monitoring_type}" (expected prometheus)`);
    }
    if (config.targets.length === 0) {
      throw new ConfigError('E_CONFIG_INVALID', 'targets must list at least one host:port to monitor');
    }
    const bad = config.targets.find(t => !parseAddress(t));
    if (bad !== undefined) {
      throw new ConfigError('E_CONFIG_INVALID', `targets: "${bad}" is not a host:port address`);
    }
    compileRules(config.alert_rules);
    await checkDependencies(config.dependencies, ctx);
    await checkPortFree(config.port, ctx);
  },

  async start(config, ctx) {
    const paths = prometheusPaths(ctx.appDir);
    const rollback = new Rollback();

    return rollback.guard(async () => {
      await writeTracked(paths.config, renderPrometheusConfig(config.targets), rollback);

      const created = await mkdir(paths.data, { recursive: true });
      if (created) rollback.add(`directory ${created}`, () => rm(created, { recursive: true, force: true }));

      const instance = await ctx.supervisor.start('monitoring', {
        kind: 'process',
        command: 'prometheus',
        args: prometheusArgs(config, ctx.appDir),
        cwd: ctx.appDir,
        env: launchEnv(config.environment),
      });
      rollback.add('prometheus process', async () => {
        await ctx.supervisor.stop('monitoring');
      });

      const details = [`Prometheus started on port ${config.port} scraping ${config.targets.join(', ')}`];

      if (config.start_grafana) {
        const result = await ctx.runner.run('systemctl', ['start', GRAFANA_UNIT]);
        if (result.code !== 0) {
          throw new StartError('E_RESOURCE_CREATE', `systemctl start ${GRAFANA_UNIT} failed: ${result.stderr || `exit ${result.code}`}`);
        }
        rollback.add(GRAFANA_UNIT, async () => {
          await ctx.runner.run('systemctl', ['stop', GRAFANA_UNIT]);
        });
        details.push(`Grafana started on port ${config.grafana_port}`);
      }

      const runtime = startAlertLoop(config, ctx);
      const tick = runtime.alertEvaluator?.tickMs;
      details.push(`Evaluating ${Object.keys(config.alert_rules).length} alert rule(s)` +
        (tick === undefined ? '' : ` every ${formatDuration(tick)}`));

      return { instance, runtime, details };
    });
  },

  async stop(config, _instance, ctx) {
    if (config.start_grafana) {
      try {
        const result = await ctx.runner.run('systemctl', ['stop', GRAFANA_UNIT]);
        if (result.code !== 0) log(`[Monitoring] systemctl stop ${GRAFANA_UNIT} exited ${result.code}`);
      } catch (err) {
        log(`[Monitoring] Could not stop ${GRAFANA_UNIT}: ${errorMessage(err)}`);
      }
    }
    await ctx.store.clear('monitoring');
  },

  describe(config, ctx) {
    return [
      `Config: ${prometheusPaths(ctx.appDir).config}`,
      `Targets: ${config.targets.join(', ')}`,
    ];
  },
};
