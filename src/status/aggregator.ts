/**
 * Status Aggregator
 *
 * Merges the live topology with the fixed service catalog. Every catalog
 * entry appears in the snapshot; services the compose tool does not report
 * read as stopped.
 *
 * With a probe engine attached, running services are also probed and
 * `healthy` reflects the result. Without one, `healthy` stays false.
 */

import type { TopologyReader } from '../lifecycle/controller.js';
import type { HealthProbeEngine } from '../health/probe.js';
import { LOGICAL_SERVICES, type LogicalService, type ServiceStatus, type SystemStatus } from '../types.js';
import { log } from '../logger.js';

export interface SnapshotOptions {
  /** Probe running services to fill `healthy` (requires a probe engine) */
  probe?: boolean;
}

export class StatusAggregator {
  constructor(
    private topology: TopologyReader,
    private prober?: HealthProbeEngine,
  ) {}

  async snapshot(verbose: boolean, options: SnapshotOptions = {}): Promise<SystemStatus> {
    const { states, droppedLines } = await this.topology.queryTopology();
    if (droppedLines > 0) {
      log(`[Status] Topology incomplete: ${droppedLines} record(s) could not be parsed`);
    }

    const entries = LOGICAL_SERVICES.map((name): [LogicalService, ServiceStatus] => {
      const live = states.get(name);
      const status: ServiceStatus = {
        name,
        running: live?.running ?? false,
        healthy: false,
        endpoint: this.prober?.endpointFor(name),
        details: {},
      };

      if (verbose && live) {
        status.details.state = live.state;
        live.ports.forEach((port, i) => {
          status.details[`port_${i}`] = port;
        });
      }

      return [name, status];
    });

    const services = Object.fromEntries(entries) as Record<LogicalService, ServiceStatus>;

    if (options.probe && this.prober) {
      const running = LOGICAL_SERVICES.filter(name => services[name].running);
      const results = await this.prober.checkAll(running);
      running.forEach((name, i) => {
        services[name].healthy = results[i].status === 'Healthy';
      });
    }

    return { services, timestamp: new Date() };
  }
}
