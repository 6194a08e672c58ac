/**
 * Command-line adapter: argv → Orchestrator call → exit code.
 */

import { Command, CommanderError } from 'commander';
import { loadConfig, stateDirFor, type Config } from './config.js';
import { formatFailure, toOrchestratorError } from './errors.js';
import { Orchestrator, type OrchestratorDeps, type RoleReport } from './orchestrator.js';
import { claimWatcher, releaseWatcher } from './supervisor/watcher.js';
import { ALL_ROLES } from './types.js';
import { log } from './logger.js';

interface CliFlags {
  configDir: string;
  appDir: string;
  action: string;
  foreground: boolean;
}

export interface CliOptions {
  settings?: Config;
  deps?: OrchestratorDeps;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Resolves when the foreground process should detach and stop */
  waitForSignal?: () => Promise<NodeJS.Signals>;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
      resolve(signal);
    };
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  });
}

/** Parse `argv` (user arguments only), run the action and return the exit code. */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const settings = options.settings ?? loadConfig();
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  let exitCode = 0;

  const program = new Command()
    .name('role-orchestrator')
    .description('Start, stop or report the status of a server role')
    .argument('<role>', `server role (${ALL_ROLES.join(', ')})`)
    .option('-c, --config-dir <dir>', 'directory holding <role>_server.json', settings.defaultConfigDir)
    .option('-a, --app-dir <dir>', 'application directory', settings.defaultAppDir)
    .option('-A, --action <action>', 'start, stop or status', 'start')
    .option('--no-foreground', 'return after start instead of staying attached to the health/alert loops')
    .exitOverride()
    .configureOutput({
      writeOut: text => out(text.trimEnd()),
      writeErr: text => err(text.trimEnd()),
    })
    .action(async (role: string, flags: CliFlags) => {
      exitCode = await execute(role, flags, settings, options, out, err);
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.help' || error.code === 'commander.version'
        ? 0
        : 1;
    }
    throw error;
  }
  return exitCode;
}

async function execute(
  role: string,
  flags: CliFlags,
  settings: Config,
  options: CliOptions,
  out: (line: string) => void,
  err: (line: string) => void,
): Promise<number> {
  const orchestrator = new Orchestrator(settings, options.deps);
  const request = { role, action: flags.action, configDir: flags.configDir, appDir: flags.appDir };

  try {
    const report = await orchestrator.run(request);
    print(report, out);

    if (report.action === 'start' && report.ownsLoops) {
      if (!flags.foreground) {
        out(`${report.role}: background loops stop when this process exits (started with --no-foreground)`);
        return 0;
      }

      const stateDir = stateDirFor(settings, flags.appDir);
      await claimWatcher(stateDir, report.role);
      out(`${report.role}: attached, send SIGINT or SIGTERM to stop`);

      const signal = await (options.waitForSignal ?? waitForSignal)();
      log(`[Orchestrator] Received ${signal}, stopping ${report.role}`);
      try {
        print(await orchestrator.run({ ...request, action: 'stop' }), out);
      } finally {
        await releaseWatcher(stateDir, report.role);
      }
    }
    return 0;
  } catch (error) {
    const failure = toOrchestratorError(error);
    err(formatFailure(failure, role, flags.action));
    return failure.exitCode;
  } finally {
    await orchestrator.shutdown();
  }
}

function print(report: RoleReport, out: (line: string) => void): void {
  for (const line of report.lines) out(line);
}
