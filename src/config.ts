/**
 * Orchestrator runtime settings.
 *
 * Role documents (`<role>_server.json`) are loaded by the ConfigStore in
 * src/roles/config-store.ts. Everything here is deployment-level and can be
 * overridden via environment variables.
 */

import path from 'node:path';

export interface RemoteConfig {
  host: string;
  port: number;
  user: string;
  keyPath: string;
}

export interface Config {
  /** Defaults for the CLI options */
  defaultConfigDir: string;
  defaultAppDir: string;

  /** Where pid files and handle records live; defaults to `<appDir>/.orchestrator` */
  stateDir?: string;

  /** nginx installation root (sites-available / sites-enabled live below it) */
  nginxRoot: string;

  /** Alert evaluation tick, bounded by the shortest rule duration */
  evaluationIntervalSeconds: number;

  /** SIGTERM → SIGKILL grace period for spawned processes */
  stopGraceSeconds: number;

  /** How long a spawned process must survive to count as started */
  startupGraceMs: number;

  /** Shared snapshot store for status queries across invocations */
  redisUrl?: string;

  /** Event log (orchestrator_events table) */
  postgresUrl?: string;

  /** Notification webhook (Discord/Slack compatible) */
  webhookUrl?: string;

  /** Run systemd actions on this host over SSH instead of locally */
  remote?: RemoteConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    defaultConfigDir: env.ORCHESTRATOR_CONFIG_DIR ?? './configs',
    defaultAppDir: env.APP_DIR ?? '/mnt/nfs/apps/current',
    stateDir: env.ORCHESTRATOR_STATE_DIR,

    nginxRoot: env.NGINX_ROOT ?? '/etc/nginx',

    evaluationIntervalSeconds: int(env.EVALUATION_INTERVAL_SECONDS, 15),
    stopGraceSeconds: int(env.STOP_GRACE_SECONDS, 10),
    startupGraceMs: int(env.STARTUP_GRACE_MS, 500),

    redisUrl: env.REDIS_URL,
    postgresUrl: env.POSTGRES_URL,
    webhookUrl: env.WEBHOOK_URL,

    remote: env.REMOTE_HOST
      ? {
          host: env.REMOTE_HOST,
          port: int(env.SSH_PORT, 22),
          user: env.SSH_USER ?? 'root',
          keyPath: env.SSH_KEY_PATH ?? '/root/.ssh/id_ed25519',
        }
      : undefined,
  };
}

export function stateDirFor(config: Config, appDir: string): string {
  return config.stateDir ?? path.join(appDir, '.orchestrator');
}

function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
