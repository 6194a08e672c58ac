/**
 * Role dispatch table. Adding a role means adding a schema variant and a
 * RoleContract here.
 */

import type { Role, ServerInstance } from '../types.js';
import type { ConfigFor, RoleConfig } from './schema.js';
import type { RoleContext, RoleContract, StartedRole } from './common.js';
import { webRole } from './web.js';
import { apiRole } from './api.js';
import { loadBalancerRole } from './loadbalancer.js';
import { databaseRole } from './database.js';
import { monitoringRole } from './monitoring.js';

export const ROLE_CONTRACTS: { readonly [R in Role]: RoleContract<ConfigFor<R>> } = {
  web: webRole,
  api: apiRole,
  loadbalancer: loadBalancerRole,
  database: databaseRole,
  monitoring: monitoringRole,
};

/** A contract closed over its config, so callers need not know the variant. */
export interface BoundRole {
  readonly role: Role;
  readonly config: RoleConfig;
  validate(ctx: RoleContext): Promise<void>;
  start(ctx: RoleContext): Promise<StartedRole>;
  stop(instance: ServerInstance | null, ctx: RoleContext): Promise<void>;
  describe(ctx: RoleContext): string[];
}

function bind<C extends RoleConfig>(contract: RoleContract<C>, config: C): BoundRole {
  return {
    role: config.server_type,
    config,
    validate: ctx => contract.validate(config, ctx),
    start: ctx => contract.start(config, ctx),
    stop: (instance, ctx) => contract.stop(config, instance, ctx),
    describe: ctx => contract.describe(config, ctx),
  };
}

export function bindRole(config: RoleConfig): BoundRole {
  switch (config.server_type) {
    case 'web':
      return bind(ROLE_CONTRACTS.web, config);
    case 'api':
      return bind(ROLE_CONTRACTS.api, config);
    case 'loadbalancer':
      return bind(ROLE_CONTRACTS.loadbalancer, config);
    case 'database':
      return bind(ROLE_CONTRACTS.database, config);
    case 'monitoring':
      return bind(ROLE_CONTRACTS.monitoring, config);
  }
}

export type { RoleContext, RoleContract, RoleRuntime, StartedRole } from './common.js';
export type { RoleConfig } from './schema.js';
