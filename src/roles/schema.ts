/**
 * Role document schemas (`<role>_server.json`), discriminated on
 * `server_type`. These check shape and per-field ranges; checks that need
 * the filesystem or span several fields live in each role's `validate`.
 */

import { z } from 'zod';
import type { Role } from '../types.js';

const Port = z.number().int().min(1).max(65535);
const DurationValue = z.union([z.string().min(1), z.number().nonnegative()]);

const common = {
  /** Applied to the launched process, never to the orchestrator itself */
  environment: z.record(z.string(), z.string()).default({}),
  /** Executables that must resolve on PATH, `name` or `name>=1.2` */
  dependencies: z.array(z.string().min(1)).default([]),
};

export const WebConfigSchema = z.object({
  server_type: z.literal('web'),
  port: Port.default(8080),
  workers: z.number().int().min(1).default(2),
  ...common,
});

export const ApiConfigSchema = z.object({
  server_type: z.literal('api'),
  port: Port.default(8000),
  workers: z.number().int().min(1).default(2),
  ...common,
});

export const HealthCheckSchema = z.object({
  path: z.string(),
  interval: DurationValue,
  timeout: DurationValue,
  retries: z.number().int().min(1),
  healthy_threshold: z.number().int().min(1).default(1),
});

export const LoadBalancerConfigSchema = z.object({
  server_type: z.literal('loadbalancer'),
  port: Port.default(80),
  backend_servers: z.array(z.string()),
  health_check: HealthCheckSchema,
  service_name: z.string().min(1).default('nginx'),
  site_name: z.string().regex(/^[\w.-]+$/, 'must be a plain file name').default('role-orchestrator'),
  ...common,
});

export const DatabaseConfigSchema = z.object({
  server_type: z.literal('database'),
  port: Port.default(5432),
  db_type: z.enum(['sqlite', 'postgres']).default('sqlite'),
  data_dir: z.string().min(1).optional(),
  db_name: z.string().min(1).optional(),
  db_user: z.string().min(1).optional(),
  db_password: z.string().min(1).optional(),
  service_name: z.string().min(1).default('postgresql'),
  ...common,
});

export const AlertRuleSchema = z.object({
  threshold: z.union([z.string().min(1), z.number()]),
  duration: DurationValue,
  metric: z.string().min(1).optional(),
  total_metric: z.string().min(1).optional(),
});

export const MonitoringConfigSchema = z.object({
  server_type: z.literal('monitoring'),
  port: Port.default(9090),
  monitoring_type: z.string().default('prometheus'),
  targets: z.array(z.string()),
  alert_rules: z.record(z.string(), AlertRuleSchema),
  start_grafana: z.boolean().default(false),
  grafana_port: Port.default(3000),
  ...common,
});

export const RoleConfigSchema = z.discriminatedUnion('server_type', [
  WebConfigSchema,
  ApiConfigSchema,
  LoadBalancerConfigSchema,
  DatabaseConfigSchema,
  MonitoringConfigSchema,
]);

export type WebConfig = z.infer<typeof WebConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type LoadBalancerConfig = z.infer<typeof LoadBalancerConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type MonitoringConfig = z.infer<typeof MonitoringConfigSchema>;
export type RoleConfig = z.infer<typeof RoleConfigSchema>;

/** Config type of one role, e.g. `ConfigFor<'web'>` */
export type ConfigFor<R extends Role> = Extract<RoleConfig, { server_type: R }>;

/** `descriptor.json` in the application directory (web and api roles) */
export const DescriptorSchema = z.object({
  web_server: z.string().default('flask'),
  app_module: z.string().min(1).default('app:app'),
  app_file: z.string().min(1).default('app.py'),
  api_module: z.string().min(1).default('api:app'),
  model_path: z.string().min(1).default('model'),
});

export type Descriptor = z.infer<typeof DescriptorSchema>;
