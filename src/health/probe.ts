/**
 * Health Probe Engine
 *
 * One bounded GET per logical service, classified as:
 *   success status  → Healthy
 *   500–599         → Degraded
 *   anything else   → Unhealthy (other statuses, transport errors, timeouts)
 *
 * Certificate validation is relaxed: stacks are often fronted by a
 * self-signed CA during setup. No retries and no caching between calls.
 */

import https from 'node:https';
import axios, { type AxiosInstance } from 'axios';
import { performance } from 'node:perf_hooks';
import type { HealthState, HealthStatus, LogicalService } from '../types.js';
import { isLogicalService } from '../types.js';
import { log } from '../logger.js';

export interface ProbeTarget {
  subdomain: string;
  path: string;
  /** Success policy; 2xx when omitted */
  accepts?: (status: number) => boolean;
}

export const PROBE_TARGETS: Record<LogicalService, ProbeTarget> = {
  'pds':            { subdomain: 'pds',            path: '/xrpc/_health' },
  'plc':            { subdomain: 'plc',            path: '/health' },
  'appview':        { subdomain: 'appview',        path: '/xrpc/_health' },
  'bgs':            { subdomain: 'bgs',            path: '/health' },
  'social-app':     { subdomain: 'social-app',     path: '/' },
  'ozone':          { subdomain: 'ozone',          path: '/health' },
  'feed-generator': { subdomain: 'feed-generator', path: '/health' },
  'jetstream':      { subdomain: 'jetstream',      path: '/health' },
};

const DEFAULT_TIMEOUT = 5_000;

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function classifyResponse(status: number, target: ProbeTarget): HealthState {
  if ((target.accepts ?? isSuccess)(status)) return 'Healthy';
  if (status >= 500 && status <= 599) return 'Degraded';
  return 'Unhealthy';
}

export interface ProbeOptions {
  timeoutMs?: number;
  /** Base URL for a service, without the health path */
  baseUrl?: (target: ProbeTarget, domain: string) => string;
}

function defaultBaseUrl(target: ProbeTarget, domain: string): string {
  return `https://${target.subdomain}.${domain}`;
}

export class HealthProbeEngine {
  private client: AxiosInstance;
  private baseUrl: (target: ProbeTarget, domain: string) => string;
  private timeoutMs: number;

  constructor(
    private domain: string,
    options: ProbeOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? defaultBaseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.client = axios.create({
      timeout: this.timeoutMs,
      httpsAgent: new https.Agent({ rejectUnauthorized: false }),
      // Classification happens here, not in axios
      validateStatus: () => true,
    });
  }

  /** Where a service is reached, or undefined for names outside the catalog */
  endpointFor(service: string): string | undefined {
    if (!isLogicalService(service)) return undefined;
    return this.baseUrl(PROBE_TARGETS[service], this.domain);
  }

  /** Never rejects: every failure is folded into Unhealthy */
  async checkService(service: string): Promise<HealthStatus> {
    const start = performance.now();

    if (!isLogicalService(service)) {
      log(`[Health] Unknown service: ${service}`);
      return { service, status: 'Unhealthy', latencyMs: elapsed(start) };
    }

    const target = PROBE_TARGETS[service];
    const url = `${this.baseUrl(target, this.domain)}${target.path}`;

    let status: HealthState;
    try {
      // axios `timeout` is reset by every chunk; the signal bounds the whole exchange
      const res = await this.client.get(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      status = classifyResponse(res.status, target);
      log(`[Health] ${service}: HTTP ${res.status} → ${status}`);
    } catch (err) {
      status = 'Unhealthy';
      log(`[Health] ${service}: ${err instanceof Error ? err.message : String(err)}`);
    }

    return { service, status, latencyMs: elapsed(start) };
  }

  /** Probe several services concurrently; results keep input order */
  async checkAll(services: readonly string[]): Promise<HealthStatus[]> {
    return Promise.all(services.map(s => this.checkService(s)));
  }
}

function elapsed(start: number): number {
  return Math.ceil(performance.now() - start);
}
