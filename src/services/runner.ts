/**
 * Command runners for service control (systemctl, nginx reloads).
 *
 * Local commands go through child_process.execFile; when a remote host is
 * configured the same command is sent over SSH.
 */

import { execFile } from 'node:child_process';
import type { Config, RemoteConfig } from '../config.js';
import { sshExec, shellQuote, type ExecResult } from './ssh.js';
import { log } from '../logger.js';

export interface CommandRunner {
  /** Human-readable target, for log lines */
  readonly target: string;
  /** Runs a command; a non-zero exit is reported in `code`, not thrown. */
  run(command: string, args: string[], timeoutMs?: number): Promise<ExecResult>;
}

export class LocalRunner implements CommandRunner {
  readonly target = 'localhost';

  run(command: string, args: string[], timeoutMs = 60_000): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      execFile(command, args, { timeout: timeoutMs }, (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: 0 });
          return;
        }
        // A numeric code means the command ran and exited non-zero
        if (typeof err.code === 'number') {
          resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: err.code });
          return;
        }
        reject(new Error(`${command} failed: ${err.message}`));
      });
    });
  }
}

export class SshRunner implements CommandRunner {
  readonly target: string;

  constructor(private readonly remote: RemoteConfig) {
    this.target = `${remote.user}@${remote.host}`;
  }

  run(command: string, args: string[], timeoutMs = 60_000): Promise<ExecResult> {
    const line = [command, ...args].map(shellQuote).join(' ');
    log(`[SSH] ${this.target}: ${line}`);
    return sshExec(this.remote, line, timeoutMs);
  }
}

export function createRunner(config: Config): CommandRunner {
  return config.remote ? new SshRunner(config.remote) : new LocalRunner();
}
