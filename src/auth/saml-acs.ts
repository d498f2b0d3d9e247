/**
 * SAML assertion consumer on loopback.
 *
 * The identity provider posts the SAML response back through the user's
 * browser to a local HTTP listener. The base64 assertion becomes the
 * OpenVPN password; the username is the fixed placeholder `N/A` that
 * SAML-enabled OpenVPN servers expect.
 *
 * Only one request matters: the first POST carrying `SAMLResponse`
 * settles the flow and the listener is closed.
 *
 * @module auth/saml-acs
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../types/outcome.js';
import { openInBrowser } from './browser.js';
import type { AuthCredentials, AuthProvider, AuthRequest } from '../connection/types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SAML_USERNAME = 'N/A';

const DEFAULT_HOST = '127.0.0.1';

/** 1 MiB; SAML responses are a few KiB even when signed and encrypted. */
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const SUCCESS_PAGE = [
  '<!doctype html>',
  '<html><head><meta charset="utf-8"><title>saml-vpn</title></head>',
  '<body><p>Authentication complete. You can close this window.</p></body></html>',
].join('\n');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SamlAcsAuthProviderOptions {
  logger: Logger;
  /** Identity-provider sign-in URL to open; unset leaves it to the user. */
  loginUrl?: string;
  /** Open `loginUrl` automatically. Default: true. */
  openBrowser?: boolean;
  /** Interface to bind. Default: 127.0.0.1. */
  host?: string;
  maxBodyBytes?: number;
  /** Browser launcher. Default: the platform opener. */
  openUrl?: (url: string) => void;
  /** Called with the bound port once the listener is up. */
  onListening?: (port: number) => void;
}

type CallbackResult =
  | { kind: 'assertion'; value: string }
  | { kind: 'error'; error: Error }
  | { kind: 'ignored' };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Read the request body, or null once it passes `limit` bytes.
 *
 * The rest of an oversized body is drained so a response can still be sent.
 */
function readBody(req: IncomingMessage, limit: number): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on('end', () => resolve(size > limit ? null : Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

function textResponse(res: ServerResponse, statusCode: number, body: string, contentType = 'text/plain'): Promise<void> {
  return new Promise((resolve) => {
    res.setHeader('content-type', `${contentType}; charset=utf-8`);
    res.setHeader('connection', 'close');
    res.writeHead(statusCode);
    res.end(body, () => resolve());
  });
}

function listenOn(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
    server.closeIdleConnections();
  });
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class SamlAcsAuthProvider implements AuthProvider {
  private readonly logger: Logger;
  private readonly loginUrl: string | undefined;
  private readonly openBrowser: boolean;
  private readonly host: string;
  private readonly maxBodyBytes: number;
  private readonly openUrl: (url: string) => void;
  private readonly onListening: ((port: number) => void) | undefined;

  constructor(options: SamlAcsAuthProviderOptions) {
    this.logger = options.logger;
    this.loginUrl = options.loginUrl;
    this.openBrowser = options.openBrowser ?? true;
    this.host = options.host ?? DEFAULT_HOST;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.openUrl = options.openUrl ?? ((url) => openInBrowser(url, this.logger));
    this.onListening = options.onListening;
  }

  async authenticate(request: AuthRequest): Promise<AuthCredentials> {
    const { signal } = request;
    if (signal.aborted) {
      throw new Error('Authentication cancelled');
    }

    const server = createServer();
    try {
      const port = await this.bind(server, request.ports);
      this.logger.debug(`SAML callback listening on http://${this.host}:${port}/`);
      this.onListening?.(port);
      this.promptSignIn(request.profile.name);

      const assertion = await this.awaitAssertion(server, signal);
      this.logger.debug(`Received SAML response (${assertion.length} bytes)`);
      return { username: SAML_USERNAME, password: assertion };
    } finally {
      await closeServer(server);
    }
  }

  private async bind(server: Server, ports: number[]): Promise<number> {
    for (const port of ports) {
      try {
        await listenOn(server, port, this.host);
      } catch (err: unknown) {
        const code = (err as NodeJS.ErrnoException).code;
        if (code === 'EADDRINUSE' || code === 'EACCES') {
          this.logger.debug(`Callback port ${port} unavailable (${code})`);
          continue;
        }
        throw err;
      }
      const address = server.address();
      return typeof address === 'object' && address !== null ? address.port : port;
    }
    throw new Error(`No free callback port (tried ${ports.join(', ')})`);
  }

  private promptSignIn(profileName: string): void {
    if (this.loginUrl === undefined) {
      this.logger.info(`Complete sign-in for ${profileName} in your browser`);
      return;
    }
    if (this.openBrowser) {
      this.logger.info(`Opening browser for sign-in: ${this.loginUrl}`);
      this.openUrl(this.loginUrl);
    } else {
      this.logger.info(`Sign in at: ${this.loginUrl}`);
    }
  }

  private awaitAssertion(server: Server, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const settle = (result: { ok: true; value: string } | { ok: false; error: Error }): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        server.off('request', onRequest);
        if (result.ok) resolve(result.value);
        else reject(result.error);
      };

      const onAbort = (): void => settle({ ok: false, error: new Error('Authentication cancelled') });

      const onRequest = (req: IncomingMessage, res: ServerResponse): void => {
        void this.handleCallback(req, res).then(
          (result) => {
            if (result.kind === 'assertion') settle({ ok: true, value: result.value });
            else if (result.kind === 'error') settle({ ok: false, error: result.error });
          },
          (err: unknown) => {
            this.logger.debug(`SAML callback request failed: ${errorMessage(err)}`);
          },
        );
      };

      signal.addEventListener('abort', onAbort, { once: true });
      server.on('request', onRequest);
      // Aborted while binding
      if (signal.aborted) onAbort();
    });
  }

  private async handleCallback(req: IncomingMessage, res: ServerResponse): Promise<CallbackResult> {
    if (req.method !== 'POST') {
      res.setHeader('allow', 'POST');
      await textResponse(res, 405, 'Method Not Allowed');
      return { kind: 'ignored' };
    }

    const body = await readBody(req, this.maxBodyBytes);
    if (body === null) {
      await textResponse(res, 413, 'Payload Too Large');
      return { kind: 'error', error: new Error(`SAML callback body exceeds ${this.maxBodyBytes} bytes`) };
    }

    const assertion = new URLSearchParams(body).get('SAMLResponse');
    if (assertion === null || assertion.trim() === '') {
      await textResponse(res, 400, 'Missing SAMLResponse');
      return { kind: 'error', error: new Error('SAML callback did not include a SAMLResponse') };
    }

    await textResponse(res, 200, SUCCESS_PAGE, 'text/html');
    return { kind: 'assertion', value: assertion };
  }
}
