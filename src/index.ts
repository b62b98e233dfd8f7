#!/usr/bin/env node
/**
 * stackwarden
 *
 * Brings up the self-hosted stack through the compose tool and reports on
 * it: live process state, per-service health probes and a public
 * readiness check.
 *
 * Usage:
 *   npx tsx src/index.ts start [pds plc ...] [--no-deps]
 *   npx tsx src/index.ts stop [--purge --yes]
 *   npx tsx src/index.ts status [--verbose] [--probe]
 *   npx tsx src/index.ts health [pds ...] [--verbose]
 *   npx tsx src/index.ts check [--no-dns] [--no-docker]
 *
 * Set FLEET_SSH_HOST to drive a remote docker host instead of the local one.
 */

import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { parseArgs, USAGE } from './cli.js';
import { runCommand, type Context } from './commands.js';
import { errorMessage } from './errors.js';
import { ProcessGroupController } from './lifecycle/controller.js';
import { HealthProbeEngine } from './health/probe.js';
import { ReadinessGate } from './health/readiness.js';
import { EventPublisher } from './services/events.js';
import { StatusStore } from './services/status-store.js';
import { LocalRunner, type CommandRunner } from './services/runner.js';
import { SshRunner } from './services/ssh.js';
import { log } from './logger.js';

async function main(): Promise<void> {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exit(2);
  }

  const config = loadConfig();
  const runner: CommandRunner = config.ssh ? new SshRunner(config.ssh) : new LocalRunner();
  const ctx: Context = {
    config,
    controller: new ProcessGroupController(config, runner),
    prober: new HealthProbeEngine(config.domain, { timeoutMs: config.probeTimeoutMs }),
    gate: new ReadinessGate({
      dnsTimeoutMs: config.dnsTimeoutMs,
      connectTimeoutMs: config.probeTimeoutMs,
    }),
    events: new EventPublisher(config),
    store: new StatusStore(config),
  };

  log(`stackwarden ${args.command} (domain: ${config.domain}, host: ${runner.target})`);

  try {
    process.exitCode = await runCommand(ctx, args);
  } finally {
    await ctx.events.close();
    ctx.store.close();
  }
}

main().catch(err => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
