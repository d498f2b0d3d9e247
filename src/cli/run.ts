/**
 * CLI dispatcher.
 *
 * Parses argv, loads the config from the data directory, builds the
 * logger and application context once, and runs one command. Returns
 * the exit code; the bin entry point owns process.exit.
 *
 * @module cli/run
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import type { Writable } from 'node:stream';
import pc from 'picocolors';
import { parseArgs, UsageError, type ParsedArgs } from './args.js';
import { createLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { readAppConfig, AppConfigError } from '../config/reader.js';
import type { AppConfig } from '../config/types.js';
import { createApplicationContext, type ApplicationContext } from '../context.js';
import type { AuthProvider, VpnEngine } from '../connection/types.js';
import { getConfigPath, getDefaultDataDir } from '../types/paths.js';
import { errorMessage } from '../types/outcome.js';
import { EXIT_SUCCESS, EXIT_USAGE } from '../client/exit-codes.js';
import {
  listProfilesCommand,
  listProfilesHelp,
  addProfileCommand,
  addProfileHelp,
  removeProfileCommand,
  removeProfileHelp,
} from './commands/profiles.js';
import {
  connectCommand,
  connectHelp,
  disconnectCommand,
  disconnectHelp,
  statusCommand,
  statusHelp,
} from './commands/connection.js';

export const BIN_NAME = 'saml-vpn';

export interface RunCliOptions {
  /** Send all output here instead of stdout/stderr (no colour, no spinner). */
  stream?: Writable;
  /** Force the connect spinner on or off. Default: stdout is a TTY. */
  interactive?: boolean;
  engine?: VpnEngine;
  auth?: AuthProvider;
}

interface CommandRuntime {
  context: ApplicationContext;
  interactive: boolean;
}

interface CommandSpec {
  summary: string;
  usage: string;
  help: string;
  run: (runtime: CommandRuntime, args: string[]) => Promise<number>;
}

const COMMANDS = new Map<string, CommandSpec>([
  ['list-profiles', {
    summary: 'List stored profiles',
    usage: 'list-profiles',
    help: listProfilesHelp,
    run: ({ context }) => listProfilesCommand(context.facade),
  }],
  ['add-profile', {
    summary: 'Store an OpenVPN config file under a name',
    usage: 'add-profile <name> <configFile>',
    help: addProfileHelp,
    run: ({ context }, args) => addProfileCommand(context.facade, args),
  }],
  ['remove-profile', {
    summary: 'Forget a stored profile',
    usage: 'remove-profile <name>',
    help: removeProfileHelp,
    run: ({ context }, args) => removeProfileCommand(context.facade, args),
  }],
  ['connect', {
    summary: 'Sign in and bring up the tunnel',
    usage: 'connect <name>',
    help: connectHelp,
    run: ({ context, interactive }, args) => connectCommand(context, args, { spinner: interactive }),
  }],
  ['disconnect', {
    summary: 'Stop the running tunnel',
    usage: 'disconnect',
    help: disconnectHelp,
    run: ({ context }) => disconnectCommand(context.facade),
  }],
  ['status', {
    summary: 'Show the running tunnel',
    usage: 'status',
    help: statusHelp,
    run: ({ context }) => statusCommand(context.facade),
  }],
]);

// ============================================================================
// Help and version
// ============================================================================

export function generalHelp(defaultDataDir: string): string {
  const commandLines = [...COMMANDS.values()].map(
    (spec) => `  ${spec.usage.padEnd(34)}${spec.summary}`,
  );
  return `
${BIN_NAME} - OpenVPN connection profiles with SAML sign-in

Usage:
  ${BIN_NAME} <command> [arguments] [options]

Commands:
${commandLines.join('\n')}

Options:
  --data-dir=<path>     Data directory (default: ${defaultDataDir})
  --log-level=<level>   error, warn, info or debug
  --verbose             Same as --log-level=debug
  -h, --help            Show help (after a command: help for that command)
  -V, --version         Show version

Files:
  <data-dir>/profiles.json   Stored profiles
  <data-dir>/config.json     Optional settings (openvpn_binary, acs_ports,
                             connect_timeout_seconds, auth.login_url, ...)
`;
}

function versionText(): string {
  const require = createRequire(import.meta.url);
  const pkg = require('../../package.json') as { version: string; name: string };
  return [
    `${pkg.name}  v${pkg.version}`,
    `Node.js       ${process.version}`,
    `Platform      ${process.platform} ${process.arch}`,
    '',
  ].join('\n');
}

// ============================================================================
// Dispatch
// ============================================================================

async function loadConfig(configPath: string, logger: Logger): Promise<AppConfig | null> {
  try {
    return await readAppConfig(configPath);
  } catch (err: unknown) {
    if (err instanceof AppConfigError) {
      logger.error(err.message);
    } else {
      logger.error(`Could not read config file ${configPath}: ${errorMessage(err)}`);
    }
    return null;
  }
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const write = (text: string): void => {
    (options.stream ?? process.stdout).write(text);
  };
  const makeLogger = (level: LogLevel): Logger =>
    createLogger({
      level,
      stream: options.stream,
      color: options.stream === undefined && pc.isColorSupported,
    });

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      makeLogger('info').error(err.message);
      write(`Run '${BIN_NAME} --help' for usage.\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const { command, positionals, options: flags } = parsed;
  const flagLevel = flags.logLevel ?? (flags.verbose ? 'debug' : undefined);

  if (flags.version) {
    write(versionText());
    return EXIT_SUCCESS;
  }

  const spec = command === undefined ? undefined : COMMANDS.get(command);
  if (command !== undefined && spec === undefined) {
    makeLogger(flagLevel ?? 'info').error(`Unknown command: ${command}`);
    write(`Run '${BIN_NAME} --help' for usage.\n`);
    return EXIT_USAGE;
  }

  if (spec === undefined || flags.help) {
    write(spec !== undefined ? spec.help : generalHelp(getDefaultDataDir()));
    return flags.help ? EXIT_SUCCESS : EXIT_USAGE;
  }

  const dataDir = flags.dataDir !== undefined ? resolve(flags.dataDir) : getDefaultDataDir();
  const configPath = getConfigPath(dataDir);
  const config = await loadConfig(configPath, makeLogger(flagLevel ?? 'info'));
  if (config === null) {
    return EXIT_USAGE;
  }

  const level = flagLevel ?? config.log_level;
  const logger = makeLogger(level);
  logger.debug(`Data directory: ${dataDir}`);

  const context = createApplicationContext({
    dataDir,
    config,
    logger,
    engine: options.engine,
    auth: options.auth,
  });

  const interactive =
    options.interactive ?? (options.stream === undefined && process.stdout.isTTY === true && level !== 'debug');

  return spec.run({ context, interactive }, positionals);
}
