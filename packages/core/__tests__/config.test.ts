/**
 * Configuration Module Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  buildConfigFromEnv,
  clearConfigCache,
  deepSubstituteEnvVars,
  loadConfig,
} from '../src/config/loader.js';
import { logger, setLogLevel } from '../src/logger/index.js';
import { AppConfigSchema, DEFAULT_GOOGLE_SCOPES } from '../src/config/schema.js';

describe('Configuration Module', () => {
  let tmpDir: string;

  beforeEach(() => {
    clearConfigCache();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowkit-config-'));
  });

  afterEach(() => {
    clearConfigCache();
    setLogLevel('info');
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, 'flowkit.config.json');
    fs.writeFileSync(file, content);
    return file;
  }

  describe('Schema Validation', () => {
    it('should fill google defaults when nothing is configured', () => {
      const config = AppConfigSchema.parse({});

      expect(config.google).toEqual({
        clientSecretPath: 'credentials.json',
        tokenPath: 'token.json',
        scopes: DEFAULT_GOOGLE_SCOPES,
        callbackPort: 0,
      });
      expect(config.logLevel).toBe('info');
      expect(config.jira).toBeUndefined();
      expect(config.confluence).toBeUndefined();
    });

    it('should reject an out of range callback port', () => {
      const result = AppConfigSchema.safeParse({ google: { callbackPort: 70000 } });
      expect(result.success).toBe(false);
    });
  });

  describe('buildConfigFromEnv', () => {
    it('should emit a jira section when JIRA_HOST is set', () => {
      const config = buildConfigFromEnv({
        JIRA_HOST: 'example.atlassian.net',
        JIRA_EMAIL: 'someone@example.com',
        JIRA_API_TOKEN: 'test-token',
      });

      expect(config).toEqual({
        jira: {
          host: 'example.atlassian.net',
          email: 'someone@example.com',
          apiToken: 'test-token',
        },
      });
    });

    it('should parse the callback port as a number', () => {
      expect(buildConfigFromEnv({ GOOGLE_OAUTH_CALLBACK_PORT: '8080' })).toEqual({
        google: { callbackPort: 8080 },
      });
    });

    it('should return an empty object for an empty environment', () => {
      expect(buildConfigFromEnv({})).toEqual({});
    });
  });

  describe('deepSubstituteEnvVars', () => {
    it('should substitute known variables and keep unknown ones', () => {
      const result = deepSubstituteEnvVars(
        { url: '${WIKI_URL}/spaces', list: ['${MISSING}'], port: 3 },
        { WIKI_URL: 'https://example.atlassian.net/wiki' }
      );

      expect(result).toEqual({
        url: 'https://example.atlassian.net/wiki/spaces',
        list: ['${MISSING}'],
        port: 3,
      });
    });
  });

  describe('loadConfig', () => {
    it('should load defaults when no file exists', () => {
      const config = loadConfig({ env: {}, configPaths: [path.join(tmpDir, 'missing.json')] });

      expect(config.google.tokenPath).toBe('token.json');
      expect(config.jira).toBeUndefined();
    });

    it('should let the config file override environment values', () => {
      const file = writeConfig(JSON.stringify({ jira: { host: 'file.atlassian.net' } }));

      const config = loadConfig({
        env: {
          JIRA_HOST: 'env.atlassian.net',
          JIRA_EMAIL: 'someone@example.com',
          JIRA_API_TOKEN: 'test-token',
        },
        configPaths: [file],
      });

      expect(config.jira).toEqual({
        host: 'file.atlassian.net',
        email: 'someone@example.com',
        apiToken: 'test-token',
      });
    });

    it('should substitute environment variables in the config file', () => {
      const file = writeConfig(
        JSON.stringify({
          confluence: {
            baseUrl: '${WIKI_URL}',
            email: 'someone@example.com',
            apiToken: 'test-token',
          },
        })
      );

      const config = loadConfig({
        env: { WIKI_URL: 'https://example.atlassian.net/wiki' },
        configPaths: [file],
      });

      expect(config.confluence?.baseUrl).toBe('https://example.atlassian.net/wiki');
      expect(config.confluence?.defaultSpace).toBeUndefined();
    });

    it('should report every invalid field', () => {
      expect(() =>
        loadConfig({
          env: { JIRA_HOST: 'example.atlassian.net', JIRA_EMAIL: 'not-an-email' },
          configPaths: [],
        })
      ).toThrow(/Invalid configuration:\n {2}- jira\.email: Valid email required for JIRA/);
    });

    it('should reject a config file with invalid JSON', () => {
      const file = writeConfig('{ not json');

      expect(() => loadConfig({ env: {}, configPaths: [file] })).toThrow(
        /^Invalid JSON in config file /
      );
    });

    it('should apply the configured log level to the shared logger', () => {
      const file = writeConfig(JSON.stringify({ logLevel: 'debug' }));

      const config = loadConfig({ env: {}, configPaths: [file] });

      expect(config.logLevel).toBe('debug');
      expect(logger.level).toBe('debug');
    });

    it('should cache the first successful load', () => {
      const first = loadConfig({ env: {}, configPaths: [] });
      const second = loadConfig({ env: { LOG_LEVEL: 'debug' }, configPaths: [] });

      expect(second).toBe(first);
      expect(second.logLevel).toBe('info');
    });
  });
});
