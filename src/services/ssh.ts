/**
 * Command execution on a remote docker host.
 *
 * Uses the ssh2 library for non-interactive commands. On timeout the
 * connection is closed and the call rejects; without a pty the remote
 * command may keep running after that.
 */

import ssh2 from 'ssh2';
import { readFileSync } from 'node:fs';
import type { SshConfig } from '../config.js';
import type { ExecResult } from '../types.js';
import { shellQuote, type CommandRunner, type RunOptions } from './runner.js';

export async function sshExec(
  ssh: SshConfig,
  command: string,
  timeoutMs = 30_000,
): Promise<ExecResult> {
  const privateKey = readFileSync(ssh.keyPath);

  return new Promise((resolve, reject) => {
    const conn = new ssh2.Client();
    const timer = timeoutMs > 0
      ? setTimeout(() => {
          conn.end();
          reject(new Error(`SSH to ${ssh.host} timed out after ${timeoutMs}ms`));
        }, timeoutMs)
      : null;

    conn
      .on('ready', () => {
        conn.exec(command, (err, stream) => {
          if (err) {
            if (timer) clearTimeout(timer);
            conn.end();
            return reject(err);
          }

          let stdout = '';
          let stderr = '';

          stream.on('data', (data: Buffer) => { stdout += data.toString(); });
          stream.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

          stream.on('close', (code: number | null) => {
            if (timer) clearTimeout(timer);
            conn.end();
            resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 });
          });
        });
      })
      .on('error', (err) => {
        if (timer) clearTimeout(timer);
        reject(new Error(`SSH to ${ssh.host}: ${err.message}`));
      })
      .connect({
        host: ssh.host,
        port: ssh.port,
        username: ssh.user,
        privateKey,
      });
  });
}

/** Build the remote shell line for a command with extra environment */
export function remoteCommand(
  command: string,
  args: string[],
  env: Record<string, string> = {},
): string {
  const assignments = Object.entries(env).map(([k, v]) => `${k}=${shellQuote(v)}`);
  const prefix = assignments.length > 0 ? `env ${assignments.join(' ')} ` : '';
  return prefix + [command, ...args].map(shellQuote).join(' ');
}

export class SshRunner implements CommandRunner {
  readonly target: string;

  constructor(private ssh: SshConfig) {
    this.target = `${ssh.user}@${ssh.host}`;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<ExecResult> {
    // A missing remote binary surfaces as exit 127 rather than a spawn error
    const result = await sshExec(this.ssh, remoteCommand(command, args, options.env), options.timeoutMs ?? 0);
    if (result.code === 127) {
      throw new Error(`${command}: not found on ${this.ssh.host}`);
    }
    return result;
  }

  async readFile(path: string): Promise<string | null> {
    const result = await sshExec(this.ssh, `cat -- ${shellQuote(path)}`);
    return result.code === 0 ? result.stdout : null;
  }

  async fileExists(path: string): Promise<boolean> {
    const result = await sshExec(this.ssh, `test -f ${shellQuote(path)}`);
    return result.code === 0;
  }
}
