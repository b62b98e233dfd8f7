/** Logical services managed as one compose group */
export const LOGICAL_SERVICES = [
  'pds',
  'plc',
  'appview',
  'bgs',
  'social-app',
  'ozone',
  'feed-generator',
  'jetstream',
] as const;

export type LogicalService = (typeof LOGICAL_SERVICES)[number];

export function isLogicalService(name: string): name is LogicalService {
  return (LOGICAL_SERVICES as readonly string[]).includes(name);
}

/** Live state of one compose unit, as reported by `compose ps` */
export interface ProcessState {
  running: boolean;
  /** Raw lifecycle state text, e.g. "running", "exited" */
  state: string;
  /** host:container bindings in reported order */
  ports: string[];
}

/** Result of a topology query */
export interface TopologyReport {
  states: Map<string, ProcessState>;
  /** Lines, or records within an array line, of `compose ps` output that could not be parsed */
  droppedLines: number;
}

export type HealthState = 'Healthy' | 'Degraded' | 'Unhealthy';

/** Result of a single health probe */
export interface HealthStatus {
  service: string;
  status: HealthState;
  latencyMs: number;
  details?: string;
}

/** Aggregated view of one logical service */
export interface ServiceStatus {
  name: LogicalService;
  running: boolean;
  healthy: boolean;
  endpoint?: string;
  version?: string;
  details: Record<string, string>;
}

/** Point-in-time snapshot of the whole catalog */
export interface SystemStatus {
  services: Record<LogicalService, ServiceStatus>;
  timestamp: Date;
}

/** Readiness gate outcome; `null` marks a skipped stage */
export interface ReadinessResult {
  dns: boolean | null;
  https: boolean | null;
  websocket: boolean | null;
}

/** Result of running an external command */
export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}
