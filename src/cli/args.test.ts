import { describe, it, expect } from 'vitest';
import { parseArgs, extractFlag, hasFlag, UsageError } from './args.js';

describe('extractFlag / hasFlag', () => {
  it('reads --key=value and keeps everything after the first =', () => {
    expect(extractFlag(['--data-dir=/tmp/a=b'], 'data-dir')).toBe('/tmp/a=b');
    expect(extractFlag(['--verbose'], 'data-dir')).toBeUndefined();
  });

  it('detects boolean flags', () => {
    expect(hasFlag(['connect', '--verbose'], 'verbose')).toBe(true);
    expect(hasFlag(['connect'], 'verbose')).toBe(false);
  });
});

describe('parseArgs', () => {
  it('splits the command from its positionals', () => {
    expect(parseArgs(['add-profile', 'work', '/etc/openvpn/work.ovpn'])).toEqual({
      command: 'add-profile',
      positionals: ['work', '/etc/openvpn/work.ovpn'],
      options: { help: false, version: false, verbose: false },
    });
  });

  it('returns no command for an empty line', () => {
    expect(parseArgs([]).command).toBeUndefined();
  });

  it('accepts global options anywhere', () => {
    const parsed = parseArgs(['--verbose', 'connect', 'work', '--data-dir=/tmp/vpn', '--log-level=warn']);

    expect(parsed.command).toBe('connect');
    expect(parsed.positionals).toEqual(['work']);
    expect(parsed.options).toEqual({
      help: false,
      version: false,
      verbose: true,
      logLevel: 'warn',
      dataDir: '/tmp/vpn',
    });
  });

  it('recognises short and long help and version flags', () => {
    expect(parseArgs(['-h']).options.help).toBe(true);
    expect(parseArgs(['status', '--help']).options.help).toBe(true);
    expect(parseArgs(['-V']).options.version).toBe(true);
    expect(parseArgs(['--version']).options.version).toBe(true);
    expect(parseArgs(['-h']).command).toBeUndefined();
  });

  it('treats everything after -- as positional', () => {
    const parsed = parseArgs(['remove-profile', '--', '--odd-name']);

    expect(parsed.command).toBe('remove-profile');
    expect(parsed.positionals).toEqual(['--odd-name']);
  });

  it('rejects an invalid log level', () => {
    expect(() => parseArgs(['status', '--log-level=loud'])).toThrow(
      new UsageError('Invalid log level: loud (expected one of error, warn, info, debug)'),
    );
  });

  it('rejects an unknown option', () => {
    expect(() => parseArgs(['status', '--colour'])).toThrow('Unknown option: --colour');
  });

  it('rejects a value option without a value', () => {
    expect(() => parseArgs(['status', '--data-dir'])).toThrow('--data-dir requires a value (--data-dir=<value>)');
    expect(() => parseArgs(['status', '--data-dir='])).toThrow('--data-dir requires a path');
  });
});
