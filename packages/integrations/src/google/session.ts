/**
 * Google session: turns the Credential Store into authenticated API clients.
 */

import { google, Auth, sheets_v4, drive_v3 } from 'googleapis';
import { createServiceLogger, type GoogleConfig } from '@flowkit/core';
import { ok, type Result } from '../result.js';
import { CredentialStore, type CredentialProvider, type TokenRefresher } from './credentials.js';
import { LoopbackConsentProvider } from './oauth.js';

const logger = createServiceLogger('google-session');

/**
 * Source of authenticated Sheets and Drive clients used by the facades
 */
export interface GoogleClients {
  sheets(): Promise<Result<sheets_v4.Sheets>>;
  drive(): Promise<Result<drive_v3.Drive>>;
}

export interface GoogleSessionOptions {
  /** Replaces the interactive browser consent (e.g. for headless use) */
  provider?: CredentialProvider;
  refresher?: TokenRefresher;
}

export class GoogleSession implements GoogleClients {
  private readonly store: CredentialStore;
  private authClient: Auth.OAuth2Client | null = null;
  private sheetsClient: sheets_v4.Sheets | null = null;
  private driveClient: drive_v3.Drive | null = null;

  constructor(config: GoogleConfig, options: GoogleSessionOptions = {}) {
    this.store = new CredentialStore({
      tokenPath: config.tokenPath,
      clientSecretPath: config.clientSecretPath,
      scopes: config.scopes,
      provider:
        options.provider ?? new LoopbackConsentProvider({ callbackPort: config.callbackPort }),
      refresher: options.refresher,
    });
  }

  /**
   * OAuth2 client carrying a currently valid access token
   */
  async getAuthClient(): Promise<Result<Auth.OAuth2Client>> {
    const credential = await this.store.ensureValid();
    if (!credential.success) {
      return credential;
    }

    if (!this.authClient) {
      this.authClient = new google.auth.OAuth2();
      logger.debug('Created Google auth client');
    }
    this.authClient.setCredentials({
      access_token: credential.data.accessToken,
      expiry_date: credential.data.expiry,
      scope: credential.data.scopes.join(' '),
    });

    return ok(this.authClient);
  }

  async sheets(): Promise<Result<sheets_v4.Sheets>> {
    const auth = await this.getAuthClient();
    if (!auth.success) return auth;

    if (!this.sheetsClient) {
      this.sheetsClient = google.sheets({ version: 'v4', auth: auth.data });
    }
    return ok(this.sheetsClient);
  }

  async drive(): Promise<Result<drive_v3.Drive>> {
    const auth = await this.getAuthClient();
    if (!auth.success) return auth;

    if (!this.driveClient) {
      this.driveClient = google.drive({ version: 'v3', auth: auth.data });
    }
    return ok(this.driveClient);
  }
}
