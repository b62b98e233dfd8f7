/**
 * Process Group Controller
 *
 * Drives the compose tool for the whole service group:
 * - start: dependency pre-flight, then `up -d` with config env + secrets
 * - stop: `down`, optionally purging volumes
 * - queryTopology: `ps --format json`, parsed tolerantly
 *
 * These are the only operations that change process state. Failures are
 * thrown as OrchestrationError with the tool's own output attached.
 */

import { baseEnvironment, type Config } from '../config.js';
import { OrchestrationError, errorMessage, type Operation } from '../errors.js';
import type { CommandRunner, RunOptions } from '../services/runner.js';
import { loadSecrets } from '../services/secrets.js';
import type { ExecResult, TopologyReport } from '../types.js';
import { parseTopology } from './topology.js';
import { log } from '../logger.js';

/** Read path over live process state */
export interface TopologyReader {
  queryTopology(): Promise<TopologyReport>;
}

export interface StartOptions {
  /** Caller-supplied variables, layered over the base environment */
  env?: Record<string, string>;
  skipDependencyCheck?: boolean;
}

export class ProcessGroupController implements TopologyReader {
  constructor(
    private config: Config,
    private runner: CommandRunner,
  ) {}

  async start(services: readonly string[] = [], options: StartOptions = {}): Promise<void> {
    if (!options.skipDependencyCheck) {
      await this.checkDependencies();
    }

    await this.requireComposeFile('start');

    let secrets: Record<string, string>;
    try {
      secrets = await loadSecrets(this.runner, this.config.secretsFile);
    } catch (err) {
      throw new OrchestrationError('start', `Cannot read secrets file ${this.config.secretsFile}`, errorMessage(err));
    }
    const env = { ...baseEnvironment(this.config), ...options.env, ...secrets };
    const scope = services.length > 0 ? services.join(', ') : 'all services';

    log(`[Compose] Starting ${scope} on ${this.runner.target} (${Object.keys(secrets).length} secrets loaded)`);
    await this.compose('start', ['up', '-d', ...services], {
      env,
      timeoutMs: this.config.commandTimeoutMs,
    });
    log(`[Compose] Started ${scope}`);
  }

  /**
   * Stop the group. With `purge`, named volumes are removed as well; that
   * data cannot be recovered.
   */
  async stop(purge: boolean): Promise<void> {
    await this.requireComposeFile('stop');

    log(`[Compose] Stopping all services${purge ? ' and removing volumes' : ''}`);
    await this.compose('stop', purge ? ['down', '-v'] : ['down'], {
      timeoutMs: this.config.commandTimeoutMs,
    });
    log('[Compose] Stopped');
  }

  async checkDependencies(): Promise<void> {
    const [composeBin, ...composeArgs] = this.config.composeCommand;
    const tools: Array<{ label: string; command: string; args: string[] }> = [
      { label: 'Docker', command: this.config.dockerCommand, args: ['--version'] },
      { label: 'Docker Compose', command: composeBin, args: [...composeArgs, '--version'] },
    ];

    for (const tool of tools) {
      let result: ExecResult;
      try {
        result = await this.runner.run(tool.command, tool.args, { timeoutMs: this.config.queryTimeoutMs });
      } catch (err) {
        throw new OrchestrationError('check-dependencies', `${tool.label} is not installed`, errorMessage(err));
      }

      if (result.code !== 0) {
        throw new OrchestrationError(
          'check-dependencies',
          `${tool.label} is not installed`,
          result.stderr || result.stdout,
        );
      }
      log(`[Compose] ${tool.label}: ${result.stdout.split('\n')[0]}`);
    }
  }

  async queryTopology(): Promise<TopologyReport> {
    const result = await this.compose('query-topology', ['ps', '--all', '--format', 'json'], {
      timeoutMs: this.config.queryTimeoutMs,
    });

    const report = parseTopology(result.stdout);
    if (report.droppedLines > 0) {
      log(`[Compose] Dropped ${report.droppedLines} malformed line(s) from ps output`);
    }
    return report;
  }

  private async requireComposeFile(operation: Operation): Promise<void> {
    let exists: boolean;
    try {
      exists = await this.runner.fileExists(this.config.composeFile);
    } catch (err) {
      throw new OrchestrationError(
        operation,
        `Cannot check compose file ${this.config.composeFile}`,
        errorMessage(err),
      );
    }

    if (!exists) {
      throw new OrchestrationError(
        operation,
        `Compose file not found: ${this.config.composeFile}. Run init first.`,
      );
    }
  }

  private async compose(operation: Operation, args: string[], options: RunOptions): Promise<ExecResult> {
    const [command, ...prefix] = this.config.composeCommand;
    const fullArgs = [...prefix, '-f', this.config.composeFile, ...args];

    let result: ExecResult;
    try {
      result = await this.runner.run(command, fullArgs, options);
    } catch (err) {
      throw new OrchestrationError(operation, `${command} ${args[0]} failed`, errorMessage(err));
    }

    if (result.code !== 0) {
      throw new OrchestrationError(
        operation,
        `${command} ${args[0]} exited with code ${result.code}`,
        result.stderr || result.stdout,
      );
    }
    return result;
  }
}
