import { describe, it, expect } from 'vitest';
import { parseArgs } from './cli.js';

describe('parseArgs()', () => {
  it('splits services from flags', () => {
    const args = parseArgs(['start', 'pds', '--no-deps', 'plc']);

    expect(args?.command).toBe('start');
    expect(args?.services).toEqual(['pds', 'plc']);
    expect([...(args?.flags ?? [])]).toEqual(['no-deps']);
  });

  it('accepts a bare command', () => {
    const args = parseArgs(['status']);

    expect(args?.services).toEqual([]);
    expect(args?.flags.size).toBe(0);
  });

  it('rejects a missing or unknown command', () => {
    expect(parseArgs([])).toBeNull();
    expect(parseArgs(['restart'])).toBeNull();
    expect(parseArgs(['--verbose'])).toBeNull();
  });
});
