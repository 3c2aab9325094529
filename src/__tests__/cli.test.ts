/**
 * Tests for command-line argument parsing
 */

import { describe, expect, it } from '@jest/globals';
import { parseArgs } from '../cli';
import { ErrorCode, RepoQueryError } from '../utils/errorHandler';

describe('parseArgs', () => {
  it('returns empty overrides without arguments', () => {
    expect(parseArgs([])).toEqual({ overrides: {}, help: false, version: false });
  });

  it('maps flags onto configuration overrides', () => {
    expect(parseArgs(['--repo', '/srv/project', '--host', '0.0.0.0', '--port', '9000', '--disable-apply'])).toEqual({
      overrides: { repoRoot: '/srv/project', host: '0.0.0.0', port: 9000, disableApply: true },
      help: false,
      version: false,
    });
  });

  it('recognizes help and version flags', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--version']).version).toBe(true);
  });

  const invalid: Array<[string[], string]> = [
    [['--repo'], 'Missing value for --repo'],
    [['--host', '--port', '80'], 'Missing value for --host'],
    [['--port', '80a'], 'Invalid value for --port: 80a'],
    [['--port', '70000'], 'Invalid value for --port: 70000'],
    [['--verbose'], 'Unknown argument: --verbose'],
  ];

  it.each(invalid)('rejects %j', (argv, message) => {
    let caught: unknown;
    try {
      parseArgs(argv);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RepoQueryError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONFIG, message });
  });
});
