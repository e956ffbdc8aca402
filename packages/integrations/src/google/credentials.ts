/**
 * Google Credential Store
 *
 * Keeps an OAuth 2.0 user credential usable across runs:
 * - loads the persisted token file
 * - refreshes it when it is about to expire
 * - falls back to a consent flow when nothing usable is left
 *
 * The token file uses the authorized-user layout (token, refresh_token,
 * token_uri, client_id, client_secret, scopes, expiry).
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { google } from 'googleapis';
import { createServiceLogger } from '@flowkit/core';
import { describeError, errors, fail, ok, type Result } from '../result.js';

const logger = createServiceLogger('google-credentials');

/** Tokens expiring within this window are refreshed ahead of time */
export const EXPIRY_SKEW_MS = 5 * 60 * 1000;

const TOKEN_URI = 'https://oauth2.googleapis.com/token';

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface Credential {
  accessToken: string;
  refreshToken?: string;
  /** Expiration timestamp (ms since epoch); absent means no known expiry */
  expiry?: number;
  scopes: string[];
}

export interface ClientSecret {
  clientId: string;
  clientSecret: string;
}

export interface ConsentRequest {
  clientSecret: ClientSecret;
  scopes: string[];
}

/**
 * Obtains a brand new credential, typically by asking the user.
 * Throwing means consent was denied or could not be completed.
 */
export interface CredentialProvider {
  obtain(request: ConsentRequest): Promise<Credential>;
}

/**
 * Exchanges a refresh token for a fresh access token.
 */
export interface TokenRefresher {
  refresh(credential: Credential, clientSecret: ClientSecret): Promise<Credential>;
}

export interface CredentialStoreOptions {
  tokenPath: string;
  clientSecretPath: string;
  scopes: string[];
  provider: CredentialProvider;
  refresher?: TokenRefresher;
  /** Clock override for tests */
  now?: () => number;
}

// =============================================================================
// File formats
// =============================================================================

const ClientSecretSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

const ClientSecretFileSchema = z
  .object({
    installed: ClientSecretSectionSchema.optional(),
    web: ClientSecretSectionSchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'expected an "installed" or "web" section',
  });

const TokenFileSchema = z.object({
  token: z.string().min(1),
  refresh_token: z.string().optional(),
  token_uri: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  expiry: z.string().optional(),
});

type TokenFile = z.infer<typeof TokenFileSchema>;

export function readClientSecret(clientSecretPath: string): ClientSecret {
  const raw: unknown = JSON.parse(fs.readFileSync(clientSecretPath, 'utf-8'));
  const parsed = ClientSecretFileSchema.parse(raw);
  const section = parsed.installed ?? parsed.web;
  if (!section) {
    throw new Error('Client secret file has no OAuth client section');
  }
  return { clientId: section.client_id, clientSecret: section.client_secret };
}

function fromTokenFile(file: TokenFile, requestedScopes: string[]): Credential {
  const expiry = file.expiry ? Date.parse(file.expiry) : undefined;
  return {
    accessToken: file.token,
    refreshToken: file.refresh_token,
    expiry: expiry !== undefined && !Number.isNaN(expiry) ? expiry : undefined,
    scopes: file.scopes ?? requestedScopes,
  };
}

function toTokenFile(credential: Credential, clientSecret: ClientSecret): TokenFile {
  return {
    token: credential.accessToken,
    refresh_token: credential.refreshToken,
    token_uri: TOKEN_URI,
    client_id: clientSecret.clientId,
    client_secret: clientSecret.clientSecret,
    scopes: credential.scopes,
    expiry: credential.expiry !== undefined ? new Date(credential.expiry).toISOString() : undefined,
  };
}

// =============================================================================
// Default refresher
// =============================================================================

/**
 * Refreshes through google-auth-library's OAuth2 client.
 */
export class GoogleTokenRefresher implements TokenRefresher {
  async refresh(credential: Credential, clientSecret: ClientSecret): Promise<Credential> {
    const client = new google.auth.OAuth2(clientSecret.clientId, clientSecret.clientSecret);
    client.setCredentials({
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiry,
    });

    const { credentials } = await client.refreshAccessToken();
    if (!credentials.access_token) {
      throw new Error('Token endpoint returned no access token');
    }

    return {
      accessToken: credentials.access_token,
      // Google usually omits the refresh token on refresh; keep the old one
      refreshToken: credentials.refresh_token ?? credential.refreshToken,
      expiry: credentials.expiry_date ?? undefined,
      scopes: credentials.scope ? credentials.scope.split(' ') : credential.scopes,
    };
  }
}

// =============================================================================
// CredentialStore Class
// =============================================================================

export class CredentialStore {
  private readonly tokenPath: string;
  private readonly clientSecretPath: string;
  private readonly scopes: string[];
  private readonly provider: CredentialProvider;
  private readonly refresher: TokenRefresher;
  private readonly now: () => number;

  constructor(options: CredentialStoreOptions) {
    this.tokenPath = options.tokenPath;
    this.clientSecretPath = options.clientSecretPath;
    this.scopes = options.scopes;
    this.provider = options.provider;
    this.refresher = options.refresher ?? new GoogleTokenRefresher();
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a usable credential, refreshing or re-consenting as needed.
   * The token file is overwritten after every refresh or consent.
   */
  async ensureValid(): Promise<Result<Credential>> {
    const op = logger.startOperation('ensureValid', { tokenPath: this.tokenPath });

    const stored = this.readTokenFile();
    const credential = stored ? fromTokenFile(stored, this.scopes) : null;

    if (credential && this.isValid(credential)) {
      op.success('Using stored credential');
      return ok(credential);
    }

    if (credential?.refreshToken && this.coversScopes(credential)) {
      const clientSecret = this.refreshClientSecret(stored);
      if (clientSecret) {
        try {
          const refreshed = await this.refresher.refresh(credential, clientSecret);
          this.save(refreshed, clientSecret);
          op.success('Credential refreshed', { expiry: refreshed.expiry });
          return ok(refreshed);
        } catch (error) {
          logger.warn('Token refresh failed, requesting consent again', {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    let clientSecret: ClientSecret;
    try {
      clientSecret = readClientSecret(this.clientSecretPath);
    } catch (error) {
      op.failure(describeError(error), { clientSecretPath: this.clientSecretPath });
      return fail(
        errors.auth(
          'missing_client_secret',
          `Client secret file not usable: ${this.clientSecretPath}`
        )
      );
    }

    try {
      const obtained = await this.provider.obtain({ clientSecret, scopes: this.scopes });
      this.save(obtained, clientSecret);
      op.success('Credential obtained through consent', { scopes: obtained.scopes.length });
      return ok(obtained);
    } catch (error) {
      op.failure(describeError(error));
      const reason = error instanceof Error ? error.message : String(error);
      return fail(errors.auth('consent_denied', `Authorization was not granted: ${reason}`));
    }
  }

  /**
   * Stored credential, or null when the file is absent or unreadable
   */
  load(): Credential | null {
    const file = this.readTokenFile();
    return file ? fromTokenFile(file, this.scopes) : null;
  }

  private readTokenFile(): TokenFile | null {
    if (!fs.existsSync(this.tokenPath)) {
      return null;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.tokenPath, 'utf-8'));
      return TokenFileSchema.parse(raw);
    } catch (error) {
      logger.warn('Ignoring unreadable token file', {
        tokenPath: this.tokenPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * OAuth client for a refresh: the one recorded in the token file, else the
   * client secret file. Null when neither is usable.
   */
  private refreshClientSecret(file: TokenFile | null): ClientSecret | null {
    if (file?.client_id && file.client_secret) {
      return { clientId: file.client_id, clientSecret: file.client_secret };
    }

    try {
      return readClientSecret(this.clientSecretPath);
    } catch (error) {
      logger.warn('No OAuth client available for refresh', {
        clientSecretPath: this.clientSecretPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private save(credential: Credential, clientSecret: ClientSecret): void {
    try {
      const dir = path.dirname(path.resolve(this.tokenPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(
        this.tokenPath,
        JSON.stringify(toTokenFile(credential, clientSecret), null, 2)
      );
      fs.chmodSync(this.tokenPath, 0o600);
      logger.debug('Saved token file', { tokenPath: this.tokenPath });
    } catch (error) {
      logger.error('Failed to save token file', {
        tokenPath: this.tokenPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private coversScopes(credential: Credential): boolean {
    return this.scopes.every((scope) => credential.scopes.includes(scope));
  }

  private isValid(credential: Credential): boolean {
    if (!this.coversScopes(credential)) {
      return false;
    }
    return credential.expiry === undefined || credential.expiry - this.now() > EXPIRY_SKEW_MS;
  }
}
