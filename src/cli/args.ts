/**
 * Command-line argument parsing.
 *
 * Global options may appear anywhere on the line, in `--key=value` form.
 * Everything else is the command followed by its positional arguments;
 * after `--` every token is positional, so profile names may start
 * with a dash.
 *
 * @module cli/args
 */

import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/logger.js';

export interface GlobalOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  /** Explicit --log-level; wins over --verbose and the config file. */
  logLevel?: LogLevel;
  dataDir?: string;
}

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: GlobalOptions;
}

const BOOLEAN_FLAGS = new Set(['help', 'version', 'verbose']);
const VALUE_FLAGS = new Set(['log-level', 'data-dir']);

/** Malformed command line. The CLI prints the message and exits 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Extract a flag value from args in --key=value format.
 */
export function extractFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present in args.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(`--${flag}`);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const separator = argv.indexOf('--');
  const flagArgs = separator === -1 ? argv : argv.slice(0, separator);
  const trailing = separator === -1 ? [] : argv.slice(separator + 1);

  const options: GlobalOptions = {
    help: hasFlag(flagArgs, 'help') || flagArgs.includes('-h'),
    version: hasFlag(flagArgs, 'version') || flagArgs.includes('-V'),
    verbose: hasFlag(flagArgs, 'verbose'),
  };

  const logLevel = extractFlag(flagArgs, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new UsageError(`Invalid log level: ${logLevel} (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    options.logLevel = logLevel;
  }

  const dataDir = extractFlag(flagArgs, 'data-dir');
  if (dataDir !== undefined) {
    if (dataDir.trim().length === 0) {
      throw new UsageError('--data-dir requires a path');
    }
    options.dataDir = dataDir;
  }

  const positionals: string[] = [];
  for (const arg of flagArgs) {
    if (arg === '-h' || arg === '-V') continue;
    if (arg.startsWith('--')) {
      const name = arg.slice(2).split('=')[0];
      if (VALUE_FLAGS.has(name) && !arg.includes('=')) {
        throw new UsageError(`${arg} requires a value (${arg}=<value>)`);
      }
      if (!BOOLEAN_FLAGS.has(name) && !VALUE_FLAGS.has(name)) {
        throw new UsageError(`Unknown option: ${arg}`);
      }
      continue;
    }
    positionals.push(arg);
  }
  positionals.push(...trailing);

  const [command, ...rest] = positionals;
  return { command, positionals: rest, options };
}
