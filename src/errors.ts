export type Operation = 'start' | 'stop' | 'check-dependencies' | 'query-topology';

/**
 * Failure of the compose tool or container runtime: missing binary,
 * missing topology file, timeout, or a non-zero exit.
 *
 * `diagnostic` holds the tool's own output unparsed.
 */
export class OrchestrationError extends Error {
  readonly operation: Operation;
  readonly diagnostic: string;

  constructor(operation: Operation, message: string, diagnostic = '') {
    super(diagnostic ? `${message}: ${diagnostic}` : message);
    this.name = 'OrchestrationError';
    this.operation = operation;
    this.diagnostic = diagnostic;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
