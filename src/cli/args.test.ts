import { describe, expect, it } from 'vitest';
import { parseArgs } from './args.js';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ command: 'help', dryRun: false, unknown: [] });
    expect(parseArgs(['--help']).command).toBe('help');
  });

  it('parses run with flags', () => {
    expect(parseArgs(['run', '--testing', '--dry-run'])).toEqual({
      command: 'run',
      testing: true,
      dryRun: true,
      unknown: [],
    });
  });

  it('leaves testing unset unless a flag is given', () => {
    expect(parseArgs(['run']).testing).toBeUndefined();
    expect(parseArgs(['run', '--no-testing']).testing).toBe(false);
  });

  it('treats preview as a dry run', () => {
    expect(parseArgs(['preview', '-t'])).toEqual({ command: 'preview', testing: true, dryRun: true, unknown: [] });
  });

  it('collects unknown commands and flags', () => {
    expect(parseArgs(['pair']).unknown).toEqual(['pair']);
    expect(parseArgs(['serve', '--verbose', 'extra']).unknown).toEqual(['--verbose', 'extra']);
  });
});
