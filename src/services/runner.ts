/**
 * Command execution on the host that runs the compose group.
 *
 * The local runner spawns processes directly; see ssh.ts for the remote one.
 */

import { spawn } from 'node:child_process';
import { readFile, stat } from 'node:fs/promises';
import type { ExecResult } from '../types.js';

export interface RunOptions {
  /** Extra variables layered over the runner's own environment */
  env?: Record<string, string>;
  /** Kill the process and reject after this long; 0 disables */
  timeoutMs?: number;
}

export interface CommandRunner {
  /** Where commands run, for log lines */
  readonly target: string;

  /**
   * Resolves with the exit code for any process that ran to completion.
   * Rejects when the binary cannot be spawned or the timeout expires.
   */
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;

  /** File contents, or null when the file does not exist */
  readFile(path: string): Promise<string | null>;

  fileExists(path: string): Promise<boolean>;
}

export class LocalRunner implements CommandRunner {
  readonly target = 'local';

  async run(command: string, args: string[], options: RunOptions = {}): Promise<ExecResult> {
    const { env, timeoutMs = 0 } = options;

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        env: { ...process.env, ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = timeoutMs > 0
        ? setTimeout(() => {
            settled = true;
            child.kill('SIGKILL');
            reject(new Error(`${command} timed out after ${timeoutMs}ms`));
          }, timeoutMs)
        : null;

      child.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      child.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      child.on('error', (err) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new Error(`${command}: ${err.message}`));
      });

      child.on('close', (code) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        // A null code means the process died on a signal
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 });
      });
    });
  }

  async readFile(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Single-quote a word for a POSIX shell */
export function shellQuote(word: string): string {
  if (/^[\w@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}
