/**
 * Tests for the loopback consent provider
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@flowkit/core', () => ({
  createServiceLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    startOperation: () => ({
      success: vi.fn(),
      failure: vi.fn(),
    }),
  }),
}));

import {
  CALLBACK_PATH,
  ConsentDeniedError,
  LoopbackConsentProvider,
  type ConsentClient,
} from '../src/google/oauth.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const CLIENT_SECRET = { clientId: 'test-client', clientSecret: 'test-secret' };

describe('LoopbackConsentProvider', () => {
  let redirectUri: string;
  let state: string;
  let client: {
    generateAuthUrl: ReturnType<typeof vi.fn>;
    getToken: ReturnType<typeof vi.fn>;
  };

  function createProvider(openBrowser: (url: string) => Promise<void>, timeoutMs = 5000) {
    return new LoopbackConsentProvider({
      timeoutMs,
      openBrowser,
      createClient: (_secret, uri) => {
        redirectUri = uri;
        return client as unknown as ConsentClient;
      },
    });
  }

  function callback(params: Record<string, string>): Promise<Response> {
    return fetch(`${redirectUri}?${new URLSearchParams(params).toString()}`);
  }

  beforeEach(() => {
    redirectUri = '';
    state = '';
    client = {
      generateAuthUrl: vi.fn().mockImplementation((opts: { state?: string }) => {
        state = opts.state || '';
        return 'https://accounts.example.com/auth';
      }),
      getToken: vi.fn().mockResolvedValue({
        tokens: {
          access_token: 'granted-token',
          refresh_token: 'granted-refresh',
          expiry_date: 1767229200000,
          scope: 'scope-a scope-b',
        },
      }),
    };
  });

  it('should exchange the callback code for a credential', async () => {
    let status = 0;
    const provider = createProvider(async () => {
      status = (await callback({ code: 'auth-code', state })).status;
    });

    const credential = await provider.obtain({ clientSecret: CLIENT_SECRET, scopes: SCOPES });

    expect(credential).toEqual({
      accessToken: 'granted-token',
      refreshToken: 'granted-refresh',
      expiry: 1767229200000,
      scopes: ['scope-a', 'scope-b'],
    });
    expect(status).toBe(200);
    expect(redirectUri).toMatch(new RegExp(`^http://127\\.0\\.0\\.1:\\d+${CALLBACK_PATH}$`));
    expect(client.generateAuthUrl).toHaveBeenCalledWith(
      expect.objectContaining({
        access_type: 'offline',
        prompt: 'consent',
        scope: SCOPES,
        code_challenge_method: 'S256',
      })
    );
    expect(client.getToken).toHaveBeenCalledWith({
      code: 'auth-code',
      codeVerifier: expect.any(String),
    });
  });

  it('should ignore callbacks with a mismatched state', async () => {
    const statuses: number[] = [];
    const provider = createProvider(async () => {
      statuses.push((await callback({ code: 'forged', state: 'wrong-state' })).status);
      statuses.push((await callback({ code: 'auth-code', state })).status);
    });

    await provider.obtain({ clientSecret: CLIENT_SECRET, scopes: SCOPES });

    expect(statuses).toEqual([400, 200]);
    expect(client.getToken).toHaveBeenCalledWith(expect.objectContaining({ code: 'auth-code' }));
  });

  it('should reject when the user denies access', async () => {
    const provider = createProvider(async () => {
      await callback({ error: 'access_denied', state });
    });

    const attempt = provider.obtain({ clientSecret: CLIENT_SECRET, scopes: SCOPES });

    await expect(attempt).rejects.toBeInstanceOf(ConsentDeniedError);
    await expect(attempt).rejects.toThrow('Consent denied: access_denied');
    expect(client.getToken).not.toHaveBeenCalled();
  });

  it('should keep waiting when the browser cannot be opened', async () => {
    const provider = createProvider(async () => {
      await callback({ code: 'auth-code', state });
      throw new Error('no display');
    });

    const credential = await provider.obtain({ clientSecret: CLIENT_SECRET, scopes: SCOPES });

    expect(credential.accessToken).toBe('granted-token');
  });

  it('should time out when no callback arrives', async () => {
    const provider = createProvider(async () => undefined, 50);

    await expect(provider.obtain({ clientSecret: CLIENT_SECRET, scopes: SCOPES })).rejects.toThrow(
      'OAuth callback timeout - authorization took too long'
    );
  });
});
