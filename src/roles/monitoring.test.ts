import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { parse } from 'yaml';
import { monitoringRole, prometheusArgs, prometheusPaths } from './monitoring.js';
import { renderPrometheusConfig } from './prometheus.js';
import { MonitoringConfigSchema } from './schema.js';
import { ProcessSupervisor } from '../supervisor/process-supervisor.js';
import { MemoryDriver, constantMetrics, makeContext } from '../testing.js';

function makeConfig(overrides: Record<string, unknown> = {}) {
  return MonitoringConfigSchema.parse({
    server_type: 'monitoring',
    targets: ['web1:8080', 'api1:8000'],
    alert_rules: { cpu: { threshold: 90, duration: 0 } },
    ...overrides,
  });
}

describe('renderPrometheusConfig', () => {
  it('scrapes every target under one job', () => {
    expect(parse(renderPrometheusConfig(['web1:8080', 'api1:8000']))).toEqual({
      global: { scrape_interval: '15s', evaluation_interval: '15s' },
      scrape_configs: [
        { job_name: 'platform', static_configs: [{ targets: ['web1:8080', 'api1:8000'] }] },
      ],
    });
  });
});

describe('prometheusArgs', () => {
  it('points prometheus at the rendered config and data directory', () => {
    expect(prometheusArgs(makeConfig(), '/srv/app')).toEqual([
      '--config.file=/srv/app/prometheus.yml',
      '--storage.tsdb.path=/srv/app/prometheus_data',
      '--web.listen-address=0.0.0.0:9090',
    ]);
  });
});

describe('monitoringRole', () => {
  let appDir: string;
  let driver: MemoryDriver;

  beforeEach(async () => {
    appDir = await mkdtemp(path.join(tmpdir(), 'monitoring-role-'));
    driver = new MemoryDriver();
  });

  afterEach(async () => {
    await rm(appDir, { recursive: true, force: true });
  });

  function context() {
    return makeContext({ appDir, stateDir: path.join(appDir, '.orchestrator') }, {
      supervisor: new ProcessSupervisor(driver),
      metricsSource: () => constantMetrics(95),
    });
  }

  it('only supports prometheus', async () => {
    await expect(monitoringRole.validate(makeConfig({ monitoring_type: 'datadog' }), context()))
      .rejects.toThrow('unsupported monitoring_type "datadog" (expected prometheus)');
  });

  it('needs host:port targets', async () => {
    await expect(monitoringRole.validate(makeConfig({ targets: [] }), context()))
      .rejects.toThrow('targets must list at least one host:port to monitor');
    await expect(monitoringRole.validate(makeConfig({ targets: ['web1'] }), context()))
      .rejects.toThrow('targets: "web1" is not a host:port address');
  });

  it('rejects bad alert rules before touching anything', async () => {
    const config = makeConfig({ alert_rules: { cpu: { threshold: 'high', duration: '1m' } } });
    await expect(monitoringRole.validate(config, context())).rejects.toMatchObject({ code: 'E_CONFIG_INVALID' });
    expect(existsSync(prometheusPaths(appDir).config)).toBe(false);
  });

  it('starts prometheus and evaluates alert rules', async () => {
    const ctx = context();
    const started = await monitoringRole.start(makeConfig(), ctx);

    expect(parse(await readFile(prometheusPaths(appDir).config, 'utf8')).scrape_configs[0].static_configs[0].targets)
      .toEqual(['web1:8080', 'api1:8000']);
    expect(existsSync(prometheusPaths(appDir).data)).toBe(true);
    expect(driver.launched[0]).toMatchObject({ kind: 'process', command: 'prometheus' });
    expect(started.details).toEqual([
      'Prometheus started on port 9090 scraping web1:8080, api1:8000',
      'Evaluating 1 alert rule(s) every 15s',
    ]);

    const transitions = await started.runtime?.alertEvaluator?.evaluate(0);
    await started.runtime?.stop();

    expect(transitions?.map(t => t.to)).toEqual(['FIRING']);
    expect(ctx.events.types()).toEqual(['ALERT_FIRING']);
    expect(ctx.notifications).toEqual(['Alert cpu FIRING (value 95)']);
    expect((await ctx.store.loadAlerts('monitoring'))?.states[0].status).toBe('FIRING');
  });

  it('starts and stops grafana when asked', async () => {
    const ctx = context();
    const config = makeConfig({ start_grafana: true });
    const started = await monitoringRole.start(config, ctx);
    await started.runtime?.stop();

    expect(started.details).toContain('Grafana started on port 3000');
    await monitoringRole.stop(config, started.instance, ctx);
    expect(ctx.runner.calls).toEqual(['systemctl start grafana-server', 'systemctl stop grafana-server']);
    expect(await ctx.store.loadAlerts('monitoring')).toBeNull();
  });

  it('stops prometheus and removes what it created when grafana fails', async () => {
    const ctx = context();
    ctx.runner.results.set('systemctl start grafana-server', { stdout: '', stderr: 'unit not found', code: 5 });

    await expect(monitoringRole.start(makeConfig({ start_grafana: true }), ctx)).rejects.toThrow(
      'systemctl start grafana-server failed: unit not found',
    );
    expect(driver.terminated).toEqual([{ kind: 'process', pid: 100, command: 'prometheus' }]);
    expect(existsSync(prometheusPaths(appDir).config)).toBe(false);
    expect(existsSync(prometheusPaths(appDir).data)).toBe(false);
  });
});
