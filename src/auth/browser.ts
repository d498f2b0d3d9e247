/**
 * Open a URL in the user's default browser.
 *
 * @module auth/browser
 */

import { spawn } from 'node:child_process';
import type { Logger } from '../logging/logger.js';

export interface BrowserCommand {
  command: string;
  args: string[];
}

/** Platform launcher for a URL: `open`, `rundll32` or `xdg-open`. */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): BrowserCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [url] };
  }
  if (platform === 'win32') {
    // Not `cmd /c start`: cmd would split the URL at & and run the rest
    return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
  }
  return { command: 'xdg-open', args: [url] };
}

/**
 * Launch the browser detached. Failure to launch is logged, not thrown:
 * the user can still open the URL by hand.
 */
export function openInBrowser(url: string, logger: Logger): void {
  const { command, args } = browserCommand(url);
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.once('error', (err: Error) => {
    logger.warn(`Could not open a browser (${err.message}). Open this URL manually: ${url}`);
  });
  child.unref();
}
