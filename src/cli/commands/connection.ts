/**
 * Connection commands: connect, disconnect, status.
 *
 * connect blocks until the tunnel is up or the attempt fails. Ctrl-C
 * cancels the attempt (a second Ctrl-C kills the CLI as usual). On a
 * terminal a spinner covers the wait between sign-in and the tunnel
 * coming up.
 *
 * @module cli/commands/connection
 */

import * as p from '@clack/prompts';
import type { CommandFacade } from '../../client/command-facade.js';
import type { ConnectionOrchestrator } from '../../connection/orchestrator.js';

export const connectHelp = `
Usage: saml-vpn connect <profileName>

Sign in through the browser and bring up the profile's OpenVPN tunnel.
Returns once the tunnel is established; OpenVPN keeps running in the
background until 'saml-vpn disconnect'. Press Ctrl-C to cancel.
`;

export const disconnectHelp = `
Usage: saml-vpn disconnect

Stop the running tunnel, including one started by an earlier 'connect'.
`;

export const statusHelp = `
Usage: saml-vpn status

Show whether a tunnel is running, for which profile, and its pid.
`;

export interface ConnectCommandContext {
  facade: CommandFacade;
  orchestrator: ConnectionOrchestrator;
}

export interface ConnectCommandOptions {
  /** Render a progress spinner (interactive terminal only). */
  spinner: boolean;
}

type Spinner = ReturnType<typeof p.spinner>;

/**
 * Show a spinner while the orchestrator is in the connecting state.
 *
 * @returns Detach function; stops a spinner still running.
 */
function attachSpinner(orchestrator: ConnectionOrchestrator): () => void {
  let spin: Spinner | null = null;

  const unsubscribe = orchestrator.onStateChange((state) => {
    if (state === 'connecting') {
      spin = p.spinner();
      spin.start('Starting OpenVPN tunnel');
      return;
    }
    if (spin !== null) {
      spin.stop(state === 'established' ? 'Tunnel established' : 'Tunnel not established');
      spin = null;
    }
  });

  return () => {
    unsubscribe();
    if (spin !== null) {
      spin.stop('Cancelled');
      spin = null;
    }
  };
}

export async function connectCommand(
  context: ConnectCommandContext,
  args: string[],
  options: ConnectCommandOptions,
): Promise<number> {
  const [name] = args;
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const detach = options.spinner ? attachSpinner(context.orchestrator) : () => undefined;
  try {
    const result = await context.facade.connect(name, { signal: controller.signal });
    return result.exitCode;
  } finally {
    detach();
    process.off('SIGINT', onSigint);
  }
}

export async function disconnectCommand(facade: CommandFacade): Promise<number> {
  const result = await facade.disconnect();
  return result.exitCode;
}

export async function statusCommand(facade: CommandFacade): Promise<number> {
  const result = await facade.status();
  return result.exitCode;
}
