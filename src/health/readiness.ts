/**
 * Readiness Gate
 *
 * Three independent checks against the public domain, in order:
 *   1. DNS: the domain has at least one A record
 *   2. HTTPS: https://test-wss.<domain>/ answers with a non-error status
 *   3. WebSocket: a handshake with wss://test-wss.<domain>/ws completes
 *
 * Each stage yields a boolean and never throws. A failed stage does not
 * stop the later ones from running unless `stopOnFailure` is set.
 */

import https from 'node:https';
import { Resolver } from 'node:dns/promises';
import axios from 'axios';
import WebSocket from 'ws';
import type { ReadinessResult } from '../types.js';
import { log } from '../logger.js';

export type ResolveFn = (domain: string) => Promise<string[]>;

export interface ReadinessOptions {
  dnsTimeoutMs?: number;
  connectTimeoutMs?: number;
  /** A-record lookup; a single-attempt Resolver by default */
  resolve4?: ResolveFn;
  /** Base URL of the debug endpoint for a domain */
  testEndpoint?: (domain: string) => string;
}

export interface StageSelection {
  dns?: boolean;
  https?: boolean;
  websocket?: boolean;
  /** Leave the stages after a failed one unrun (reported as null) */
  stopOnFailure?: boolean;
}

type Stage = 'dns' | 'https' | 'websocket';

export function isIPv4Address(value: string): boolean {
  const octets = value.trim().split('.');
  return octets.length === 4 && octets.every(o => /^\d{1,3}$/.test(o) && Number(o) <= 255);
}

function defaultResolver(timeoutMs: number): ResolveFn {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  return domain => resolver.resolve4(domain);
}

export class ReadinessGate {
  private resolve4: ResolveFn;
  private connectTimeoutMs: number;
  private testEndpoint: (domain: string) => string;
  private agent = new https.Agent({ rejectUnauthorized: false });

  constructor(options: ReadinessOptions = {}) {
    this.resolve4 = options.resolve4 ?? defaultResolver(options.dnsTimeoutMs ?? 2_000);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5_000;
    this.testEndpoint = options.testEndpoint ?? (domain => `https://test-wss.${domain}`);
  }

  async checkDns(domain: string): Promise<boolean> {
    try {
      const records = await this.resolve4(domain);
      const ok = records.some(isIPv4Address);
      log(`[Readiness] DNS ${domain}: ${ok ? records.join(', ') : 'no A records'}`);
      return ok;
    } catch (err) {
      log(`[Readiness] DNS ${domain}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  async checkHttps(domain: string): Promise<boolean> {
    const url = `${this.testEndpoint(domain)}/`;
    try {
      const res = await axios.get(url, {
        timeout: this.connectTimeoutMs,
        signal: AbortSignal.timeout(this.connectTimeoutMs),
        httpsAgent: this.agent,
        maxRedirects: 5,
        validateStatus: () => true,
      });
      log(`[Readiness] HTTPS ${url}: HTTP ${res.status}`);
      return res.status < 400;
    } catch (err) {
      log(`[Readiness] HTTPS ${url}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  async checkWebSocket(domain: string): Promise<boolean> {
    const url = `${this.testEndpoint(domain)}/ws`.replace(/^http/, 'ws');

    return new Promise(resolve => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, {
          handshakeTimeout: this.connectTimeoutMs,
          rejectUnauthorized: false,
        });
      } catch (err) {
        log(`[Readiness] WebSocket ${url}: ${err instanceof Error ? err.message : String(err)}`);
        resolve(false);
        return;
      }

      ws.on('open', () => {
        log(`[Readiness] WebSocket ${url}: handshake complete`);
        ws.close();
        resolve(true);
      });
      // Non-101 answers arrive here as "Unexpected server response: <status>"
      ws.on('error', err => {
        log(`[Readiness] WebSocket ${url}: ${err.message}`);
        resolve(false);
      });
    });
  }

  /** Run the selected stages in order; deselected or unrun stages report null */
  async run(domain: string, stages: StageSelection = {}): Promise<ReadinessResult> {
    const { dns = true, https: httpsStage = true, websocket = true, stopOnFailure = false } = stages;
    const plan: Array<[Stage, boolean, () => Promise<boolean>]> = [
      ['dns', dns, () => this.checkDns(domain)],
      ['https', httpsStage, () => this.checkHttps(domain)],
      ['websocket', websocket, () => this.checkWebSocket(domain)],
    ];

    const result: ReadinessResult = { dns: null, https: null, websocket: null };
    for (const [stage, selected, check] of plan) {
      if (!selected) continue;
      result[stage] = await check();
      if (stopOnFailure && !result[stage]) break;
    }
    return result;
  }
}
