/**
 * Subcommand handlers for the CLI. Each returns the process exit code;
 * orchestration errors propagate to the entry point.
 */

import type { Config } from './config.js';
import type { ParsedArgs } from './cli.js';
import { errorMessage } from './errors.js';
import type { ProcessGroupController } from './lifecycle/controller.js';
import type { HealthProbeEngine } from './health/probe.js';
import type { ReadinessGate } from './health/readiness.js';
import { StatusAggregator } from './status/aggregator.js';
import { readinessPassed, renderHealth, renderReadiness, renderStatus } from './status/report.js';
import type { EventPublisher, LifecycleAction } from './services/events.js';
import type { StatusStore } from './services/status-store.js';
import { LOGICAL_SERVICES } from './types.js';

export interface Context {
  config: Config;
  controller: ProcessGroupController;
  prober: HealthProbeEngine;
  gate: ReadinessGate;
  events: EventPublisher;
  store: StatusStore;
}

async function lifecycle(
  ctx: Context,
  action: LifecycleAction,
  services: readonly string[],
  run: () => Promise<void>,
): Promise<void> {
  try {
    await run();
  } catch (err) {
    await ctx.events.publishLifecycle(action, services, errorMessage(err));
    throw err;
  }
  await ctx.events.publishLifecycle(action, services);
}

export async function runCommand(ctx: Context, args: ParsedArgs): Promise<number> {
  const { config, controller, prober, gate, store } = ctx;
  const verbose = args.flags.has('verbose');

  switch (args.command) {
    case 'start':
      await lifecycle(ctx, 'START', args.services, () =>
        controller.start(args.services, { skipDependencyCheck: args.flags.has('no-deps') }),
      );
      console.log('Services started successfully!');
      return 0;

    case 'stop': {
      const purge = args.flags.has('purge');
      if (purge && !args.flags.has('yes')) {
        console.error('--purge deletes all service volumes. Re-run with --yes to confirm.');
        return 1;
      }
      await lifecycle(ctx, purge ? 'PURGE' : 'STOP', [], () => controller.stop(purge));
      console.log('Services stopped successfully!');
      return 0;
    }

    case 'status': {
      const aggregator = new StatusAggregator(controller, prober);
      const status = await aggregator.snapshot(verbose, { probe: args.flags.has('probe') });
      console.log(`\n${renderStatus(status, verbose)}\n`);
      await store.saveStatus(status);
      return 0;
    }

    case 'health': {
      const names = args.services.length > 0 ? args.services : [...LOGICAL_SERVICES];
      const results = await prober.checkAll(names);
      for (const result of results) {
        console.log(renderHealth(result, verbose));
      }
      await store.saveHealth(results);
      return results.every(r => r.status === 'Healthy') ? 0 : 1;
    }

    case 'check': {
      if (!args.flags.has('no-dns')) {
        const result = await gate.run(config.domain, { stopOnFailure: true });
        console.log(renderReadiness(result));
        if (!readinessPassed(result)) {
          console.log('Environment check failed');
          return 1;
        }
      }
      if (!args.flags.has('no-docker')) {
        await controller.checkDependencies();
        console.log('Docker dependencies: OK');
      }
      console.log('Environment check completed successfully!');
      return 0;
    }
  }
}
