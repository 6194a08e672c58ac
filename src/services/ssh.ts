/**
 * SSH command execution on a remote role host.
 *
 * Uses native ssh2 library for non-interactive commands.
 */

import ssh2 from 'ssh2';
import { readFile } from 'node:fs/promises';
import type { RemoteConfig } from '../config.js';
import { errorMessage } from '../errors.js';

const { Client } = ssh2;

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

export async function sshExec(
  remote: RemoteConfig,
  command: string,
  timeoutMs = 30_000,
): Promise<ExecResult> {
  let privateKey: Buffer;
  try {
    privateKey = await readFile(remote.keyPath);
  } catch (err) {
    throw new Error(`SSH key ${remote.keyPath}: ${errorMessage(err)}`, { cause: err });
  }

  return new Promise((resolve, reject) => {
    const conn = new Client();
    const timer = setTimeout(() => {
      conn.end();
      reject(new Error(`SSH to ${remote.host} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    conn
      .on('ready', () => {
        conn.exec(command, (err, stream) => {
          if (err) {
            clearTimeout(timer);
            conn.end();
            return reject(err);
          }

          let stdout = '';
          let stderr = '';

          stream.on('data', (data: Buffer) => { stdout += data.toString(); });
          stream.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

          stream.on('close', (code: number | null) => {
            clearTimeout(timer);
            conn.end();
            resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 });
          });
        });
      })
      .on('error', (err) => {
        clearTimeout(timer);
        reject(new Error(`SSH to ${remote.host}: ${err.message}`));
      })
      .connect({
        host: remote.host,
        port: remote.port,
        username: remote.user,
        privateKey,
      });
  });
}

/** Single-quote an argument for a remote POSIX shell. */
export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
