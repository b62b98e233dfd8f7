/**
 * Fleet configuration.
 *
 * All values can be overridden via environment variables (a `.env` file in
 * the working directory is loaded by the entry point).
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export interface SshConfig {
  host: string;
  port: number;
  user: string;
  keyPath: string;
}

export interface Config {
  /** Base domain every service is published under */
  domain: string;
  bindAddress: string;
  useTls: boolean;

  /** Compose topology file handed to the compose tool */
  composeFile: string;
  /** dotenv-format secrets merged into the start environment */
  secretsFile: string;

  /** Compose invocation, e.g. ['docker', 'compose'] or ['docker-compose'] */
  composeCommand: string[];
  dockerCommand: string;

  /** Timeout for `up` / `down` */
  commandTimeoutMs: number;
  /** Timeout for `ps` and version queries */
  queryTimeoutMs: number;

  probeTimeoutMs: number;
  dnsTimeoutMs: number;

  /** Run compose on a remote docker host instead of locally */
  ssh?: SshConfig;

  /** Latest status export (optional) */
  redisUrl?: string;
  statusTtlSeconds: number;

  /** Lifecycle event log (optional) */
  postgresUrl?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const sshHost = env.FLEET_SSH_HOST;

  return {
    domain: env.FLEET_DOMAIN ?? 'localhost',
    bindAddress: env.FLEET_BIND_ADDRESS ?? '0.0.0.0',
    useTls: bool(env.FLEET_USE_TLS, true),

    composeFile: env.FLEET_COMPOSE_FILE ?? 'docker-compose.yml',
    secretsFile: env.FLEET_SECRETS_FILE ?? 'config/secrets.env',

    composeCommand: words(env.FLEET_COMPOSE_BIN, ['docker', 'compose']),
    dockerCommand: env.FLEET_DOCKER_BIN ?? 'docker',

    commandTimeoutMs: int(env.FLEET_COMMAND_TIMEOUT_SECONDS, 600) * 1000,
    queryTimeoutMs: int(env.FLEET_QUERY_TIMEOUT_SECONDS, 30) * 1000,

    probeTimeoutMs: int(env.FLEET_PROBE_TIMEOUT_MS, 5_000),
    dnsTimeoutMs: int(env.FLEET_DNS_TIMEOUT_MS, 2_000),

    ssh: sshHost
      ? {
          host: sshHost,
          port: int(env.FLEET_SSH_PORT, 22),
          user: env.FLEET_SSH_USER ?? 'root',
          keyPath: env.FLEET_SSH_KEY_PATH ?? join(homedir(), '.ssh', 'id_ed25519'),
        }
      : undefined,

    redisUrl: env.REDIS_URL,
    statusTtlSeconds: int(env.FLEET_STATUS_TTL_SECONDS, 300),

    postgresUrl: env.POSTGRES_URL,
  };
}

/** Variables every compose start receives before caller env and secrets */
export function baseEnvironment(config: Config): Record<string, string> {
  return {
    DOMAIN: config.domain,
    BIND_ADDRESS: config.bindAddress,
    USE_TLS: String(config.useTls),
  };
}

function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function bool(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined || val === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(val.toLowerCase());
}

function words(val: string | undefined, fallback: string[]): string[] {
  const parts = (val ?? '').split(/\s+/).filter(Boolean);
  return parts.length > 0 ? parts : fallback;
}
