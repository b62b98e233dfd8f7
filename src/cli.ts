export type Command = 'start' | 'stop' | 'status' | 'health' | 'check';

const COMMANDS: readonly Command[] = ['start', 'stop', 'status', 'health', 'check'];

export interface ParsedArgs {
  command: Command;
  /** Positional arguments after the command (service names) */
  services: string[];
  flags: Set<string>;
}

export const USAGE = `Usage: stackwarden <command> [options]

Commands:
  start [service...] [--no-deps]    Start all or selected services
  stop [--purge --yes]              Stop services (--purge also deletes volumes)
  status [--verbose] [--probe]      Show service status
  health [service...] [--verbose]   Probe service health endpoints
  check [--no-dns] [--no-docker]    Check environment readiness`;

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs | null {
  const [command, ...rest] = argv;
  if (command === undefined || !isCommand(command)) return null;

  return {
    command,
    services: rest.filter(a => !a.startsWith('--')),
    flags: new Set(rest.filter(a => a.startsWith('--')).map(a => a.slice(2))),
  };
}
