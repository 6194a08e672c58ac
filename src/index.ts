#!/usr/bin/env node
/**
 * Role Orchestrator
 *
 * Starts, stops or reports the status of one server role.
 *
 * Usage:
 *   npx tsx src/index.ts web                         # start the web role
 *   npx tsx src/index.ts loadbalancer -A status      # pool membership
 *   npx tsx src/index.ts monitoring -A stop -c ./configs -a /srv/app
 *
 * Loop-owning roles (loadbalancer, monitoring) stay attached in the
 * foreground until SIGINT/SIGTERM unless started with --no-foreground.
 */

import { runCli } from './cli.js';
import { errorMessage } from './errors.js';
import { logError } from './logger.js';

runCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    logError(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
