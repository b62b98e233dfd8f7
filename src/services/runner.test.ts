/**
 * Local Runner Tests
 *
 * Spawns only the current Node binary.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalRunner, shellQuote } from './runner.js';
import { loadSecrets } from './secrets.js';

const node = process.execPath;
const runner = new LocalRunner();

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'stackwarden-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('LocalRunner.run()', () => {
  it('captures trimmed stdout, stderr and the exit code', async () => {
    const result = await runner.run(node, ['-e', 'console.log("up"); console.error("warn"); process.exit(3)']);

    expect(result).toEqual({ stdout: 'up', stderr: 'warn', code: 3 });
  });

  it('layers extra env over the process environment', async () => {
    const result = await runner.run(node, ['-e', 'console.log(process.env.PDS_JWT_SECRET)'], {
      env: { PDS_JWT_SECRET: 'test-secret' },
    });

    expect(result.stdout).toBe('test-secret');
  });

  it('rejects when the binary does not exist', async () => {
    await expect(runner.run('stackwarden-missing-binary', ['--version'])).rejects.toThrow(
      'stackwarden-missing-binary: spawn stackwarden-missing-binary ENOENT',
    );
  });

  it('kills the process and rejects on timeout', async () => {
    const started = Date.now();

    await expect(runner.run(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 })).rejects.toThrow(
      `${node} timed out after 200ms`,
    );
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});

describe('LocalRunner files', () => {
  it('reads a file and reports it as existing', async () => {
    const path = join(dir, 'docker-compose.yml');
    await writeFile(path, 'services: {}\n');

    expect(await runner.fileExists(path)).toBe(true);
    expect(await runner.readFile(path)).toBe('services: {}\n');
  });

  it('returns null and false for a missing file', async () => {
    const path = join(dir, 'absent.yml');

    expect(await runner.fileExists(path)).toBe(false);
    expect(await runner.readFile(path)).toBeNull();
  });

  it('does not treat a directory as a file', async () => {
    const path = join(dir, 'config');
    await mkdir(path, { recursive: true });

    expect(await runner.fileExists(path)).toBe(false);
  });
});

describe('loadSecrets()', () => {
  it('parses a dotenv secrets file', async () => {
    const path = join(dir, 'secrets.env');
    await writeFile(path, '# generated\nPDS_JWT_SECRET=test-secret\nPDS_ADMIN_PASSWORD="test password"\n');

    expect(await loadSecrets(runner, path)).toEqual({
      PDS_JWT_SECRET: 'test-secret',
      PDS_ADMIN_PASSWORD: 'test password',
    });
  });

  it('returns no variables when the file is absent', async () => {
    expect(await loadSecrets(runner, join(dir, 'missing.env'))).toEqual({});
  });
});

describe('shellQuote()', () => {
  it('leaves plain words alone', () => {
    expect(shellQuote('docker-compose.yml')).toBe('docker-compose.yml');
    expect(shellQuote('--format')).toBe('--format');
  });

  it('single-quotes words with shell metacharacters', () => {
    expect(shellQuote('a b')).toBe(`'a b'`);
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote('')).toBe(`''`);
  });
});
