/**
 * Interactive Google consent
 *
 * Browser-based OAuth 2.0 authorization-code flow with PKCE. A short-lived
 * callback server on the loopback interface receives the redirect.
 */

import { google, Auth } from 'googleapis';
import { CodeChallengeMethod } from 'google-auth-library';
import { createServer, Server, IncomingMessage, ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import crypto from 'crypto';
import { createServiceLogger } from '@flowkit/core';
import type { ClientSecret, ConsentRequest, Credential, CredentialProvider } from './credentials.js';

const logger = createServiceLogger('google-oauth');

export const CALLBACK_PATH = '/oauth/google/callback';
const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

const HTML_SUCCESS = `<!DOCTYPE html>
<html><head><title>Authorization complete</title></head>
<body><h1>Authorization complete</h1><p>You can close this window and return to the terminal.</p></body>
</html>`;

const HTML_ERROR = (message: string) => `<!DOCTYPE html>
<html><head><title>Authorization failed</title></head>
<body><h1>Authorization failed</h1><p>${message.replace(/[<>&"]/g, '')}</p></body>
</html>`;

/**
 * The part of an OAuth2 client the consent flow needs
 */
export type ConsentClient = Pick<Auth.OAuth2Client, 'generateAuthUrl' | 'getToken'>;

export interface LoopbackConsentOptions {
  /** Port to listen on; 0 lets the OS pick a free one */
  callbackPort?: number;
  timeoutMs?: number;
  /** Opens the authorization URL; defaults to the `open` package */
  openBrowser?: (url: string) => Promise<void>;
  createClient?: (clientSecret: ClientSecret, redirectUri: string) => ConsentClient;
}

export class ConsentDeniedError extends Error {
  constructor(reason: string) {
    super(`Consent denied: ${reason}`);
    this.name = 'ConsentDeniedError';
  }
}

async function openWithDefaultBrowser(url: string): Promise<void> {
  const open = (await import('open')).default;
  await open(url);
}

function createGoogleClient(clientSecret: ClientSecret, redirectUri: string): ConsentClient {
  return new google.auth.OAuth2(clientSecret.clientId, clientSecret.clientSecret, redirectUri);
}

type CallbackOutcome = { code: string } | { error: Error };

interface PendingCallback {
  outcome: Promise<CallbackOutcome>;
  cancel: () => void;
}

/**
 * CredentialProvider that asks the user to authorize in a browser.
 */
export class LoopbackConsentProvider implements CredentialProvider {
  private readonly callbackPort: number;
  private readonly timeoutMs: number;
  private readonly openBrowser: (url: string) => Promise<void>;
  private readonly createClient: (clientSecret: ClientSecret, redirectUri: string) => ConsentClient;

  constructor(options: LoopbackConsentOptions = {}) {
    this.callbackPort = options.callbackPort ?? 0;
    this.timeoutMs = options.timeoutMs ?? CALLBACK_TIMEOUT_MS;
    this.openBrowser = options.openBrowser ?? openWithDefaultBrowser;
    this.createClient = options.createClient ?? createGoogleClient;
  }

  async obtain(request: ConsentRequest): Promise<Credential> {
    const op = logger.startOperation('obtainConsent', { scopes: request.scopes.length });

    const state = crypto.randomBytes(32).toString('hex');
    const codeVerifier = crypto.randomBytes(32).toString('base64url');
    const codeChallenge = crypto.createHash('sha256').update(codeVerifier).digest('base64url');

    const server = createServer();
    const pending = this.waitForCallback(server, state);

    try {
      const port = await this.listen(server);
      const redirectUri = `http://127.0.0.1:${port}${CALLBACK_PATH}`;
      const client = this.createClient(request.clientSecret, redirectUri);

      const authUrl = client.generateAuthUrl({
        access_type: 'offline',
        scope: request.scopes,
        state,
        code_challenge_method: CodeChallengeMethod.S256,
        code_challenge: codeChallenge,
        prompt: 'consent',
      });

      process.stderr.write(
        `\nAuthorize access in your browser. If it does not open, visit:\n\n  ${authUrl}\n\n`
      );
      try {
        await this.openBrowser(authUrl);
      } catch (error) {
        logger.warn('Could not open a browser, waiting for manual authorization', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const outcome = await pending.outcome;
      if ('error' in outcome) {
        throw outcome.error;
      }
      const code = outcome.code;
      const { tokens } = await client.getToken({ code, codeVerifier });
      if (!tokens.access_token) {
        throw new Error('Token exchange returned no access token');
      }

      op.success('Consent granted');
      return {
        accessToken: tokens.access_token,
        refreshToken: tokens.refresh_token ?? undefined,
        expiry: tokens.expiry_date ?? undefined,
        scopes: tokens.scope ? tokens.scope.split(' ') : request.scopes,
      };
    } catch (error) {
      op.failure(error instanceof Error ? error : String(error));
      throw error;
    } finally {
      pending.cancel();
      server.closeAllConnections();
      server.close();
    }
  }

  private listen(server: Server): Promise<number> {
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.callbackPort, '127.0.0.1', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Callback server has no TCP address'));
          return;
        }
        const { port }: AddressInfo = address;
        logger.debug('OAuth callback server listening', { port });
        resolve(port);
      });
    });
  }

  private waitForCallback(server: Server, expectedState: string): PendingCallback {
    let timeout: ReturnType<typeof setTimeout> | undefined;

    const outcome = new Promise<CallbackOutcome>((resolve) => {
      timeout = setTimeout(() => {
        resolve({ error: new Error('OAuth callback timeout - authorization took too long') });
      }, this.timeoutMs);

      server.on('request', (req: IncomingMessage, res: ServerResponse) => {
        const url = new URL(req.url || '', 'http://127.0.0.1');

        if (url.pathname !== CALLBACK_PATH) {
          res.writeHead(404);
          res.end('Not Found');
          return;
        }

        const error = url.searchParams.get('error');
        const state = url.searchParams.get('state');
        const authCode = url.searchParams.get('code');

        logger.info('Received Google OAuth callback', { hasCode: Boolean(authCode), error });

        if (state !== expectedState) {
          res.writeHead(400, { 'Content-Type': 'text/html' });
          res.end(HTML_ERROR('State mismatch'));
          return;
        }

        if (error) {
          const reason = url.searchParams.get('error_description') || error;
          res.writeHead(400, { 'Content-Type': 'text/html' });
          res.end(HTML_ERROR(reason));
          resolve({ error: new ConsentDeniedError(reason) });
          return;
        }

        if (!authCode) {
          res.writeHead(400, { 'Content-Type': 'text/html' });
          res.end(HTML_ERROR('No authorization code provided'));
          return;
        }

        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(HTML_SUCCESS);
        resolve({ code: authCode });
      });
    });

    return {
      outcome,
      cancel: () => {
        if (timeout) clearTimeout(timeout);
      },
    };
  }
}
