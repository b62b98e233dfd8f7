/**
 * Plain-text rendering of status, health and readiness results.
 * Pure functions: nothing here queries or probes.
 */

import type { HealthState, HealthStatus, ReadinessResult, SystemStatus } from '../types.js';

const HEALTH_MARK: Record<HealthState, string> = {
  Healthy: '✓',
  Degraded: '!',
  Unhealthy: '✗',
};

export function renderStatus(status: SystemStatus, verbose: boolean): string {
  const lines = ['Service Status:', '============='];

  for (const svc of Object.values(status.services)) {
    const mark = svc.running ? '✓' : '✗';
    if (verbose) {
      lines.push(`${mark} ${svc.name}`);
      if (svc.endpoint) lines.push(`  endpoint: ${svc.endpoint}`);
      lines.push(`  healthy: ${svc.healthy}`);
      for (const [key, value] of Object.entries(svc.details)) {
        lines.push(`  ${key}: ${value}`);
      }
    } else {
      lines.push(`${mark} ${svc.name} - ${svc.running ? 'Running' : 'Stopped'}`);
    }
  }

  lines.push('', `Last Updated: ${status.timestamp.toISOString()}`);
  return lines.join('\n');
}

export function renderHealth(result: HealthStatus, verbose: boolean): string {
  const head = `${HEALTH_MARK[result.status]} ${result.service} - ${result.status}`;
  if (!verbose) return head;

  const lines = [head, `  Latency: ${result.latencyMs}ms`];
  if (result.details) lines.push(`  Details: ${result.details}`);
  return lines.join('\n');
}

export function renderReadiness(result: ReadinessResult): string {
  const stage = (label: string, ok: boolean | null) =>
    `${label}: ${ok === null ? 'skipped' : ok ? 'OK' : 'FAILED'}`;

  return [
    stage('DNS configuration', result.dns),
    stage('HTTPS endpoint', result.https),
    stage('WebSocket endpoint', result.websocket),
  ].join('\n');
}

/** True when no selected stage failed */
export function readinessPassed(result: ReadinessResult): boolean {
  return result.dns !== false && result.https !== false && result.websocket !== false;
}
