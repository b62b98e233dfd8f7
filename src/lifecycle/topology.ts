/**
 * Parser for `compose ps --format json` output.
 *
 * Compose v2 prints one JSON object per line; older v2 releases print a
 * single JSON array. Every record is validated on its own so that one bad
 * record cannot void the whole listing.
 */

import { z } from 'zod';
import type { ProcessState, TopologyReport } from '../types.js';

const PublisherSchema = z.object({
  URL: z.string().optional(),
  TargetPort: z.number(),
  PublishedPort: z.number(),
  Protocol: z.string().optional(),
});

const ComposeRecordSchema = z
  .object({
    Service: z.string().min(1).optional(),
    Name: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    State: z.string().optional(),
    state: z.string().optional(),
    Publishers: z.array(PublisherSchema).nullish(),
    ports: z.array(z.string()).optional(),
  })
  .refine(r => (r.Service ?? r.Name ?? r.name) !== undefined, { message: 'record has no name' })
  .refine(r => (r.State ?? r.state) !== undefined, { message: 'record has no state' });

type ComposeRecord = z.infer<typeof ComposeRecordSchema>;

function toProcessState(record: ComposeRecord): [string, ProcessState] {
  const name = record.Service ?? record.Name ?? record.name ?? '';
  const state = record.State ?? record.state ?? '';

  // Compose lists a binding once per address family (0.0.0.0 and ::)
  const ports = record.Publishers
    ? record.Publishers
        .filter(p => p.PublishedPort > 0)
        .map(p => `${p.PublishedPort}:${p.TargetPort}`)
    : record.ports ?? [];

  return [name, { running: state === 'running', state, ports: [...new Set(ports)] }];
}

interface ParsedLine {
  records: ComposeRecord[];
  rejected: number;
}

/** Parse one line into its valid records and a count of the rejected ones */
function parseLine(line: string): ParsedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return { records: [], rejected: 1 };
  }

  const items: unknown[] = Array.isArray(raw) ? raw : [raw];
  const records: ComposeRecord[] = [];
  let rejected = 0;
  for (const item of items) {
    const parsed = ComposeRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      rejected++;
    }
  }
  return { records, rejected };
}

export function parseTopology(output: string): TopologyReport {
  const states = new Map<string, ProcessState>();
  let droppedLines = 0;

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const { records, rejected } = parseLine(trimmed);
    droppedLines += rejected;

    for (const record of records) {
      const [name, state] = toProcessState(record);
      states.set(name, state);
    }
  }

  return { states, droppedLines };
}
