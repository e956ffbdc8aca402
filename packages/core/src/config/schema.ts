/**
 * Configuration Schema Definitions
 *
 * Zod schemas for every configuration section. Each integration section is
 * optional so a process can configure only the facades it uses.
 */

import { z } from 'zod';

// =============================================================================
// JIRA Configuration
// =============================================================================

export const JiraConfigSchema = z.object({
  /** JIRA host, with or without scheme (e.g., "yourorg.atlassian.net") */
  host: z.string().min(1, 'JIRA host is required'),
  /** Email for JIRA API authentication */
  email: z.string().email('Valid email required for JIRA'),
  /** JIRA API token */
  apiToken: z.string().min(1, 'JIRA API token is required'),
});

export type JiraConfig = z.infer<typeof JiraConfigSchema>;

// =============================================================================
// Confluence Configuration
// =============================================================================

export const ConfluenceConfigSchema = z.object({
  /** Site URL, e.g. "https://yourorg.atlassian.net/wiki" */
  baseUrl: z.string().url('Confluence base URL must be a valid URL'),
  email: z.string().email('Valid email required for Confluence'),
  apiToken: z.string().min(1, 'Confluence API token is required'),
  /** Space searched when a call names none */
  defaultSpace: z.string().optional(),
});

export type ConfluenceConfig = z.infer<typeof ConfluenceConfigSchema>;

// =============================================================================
// Google Configuration
// =============================================================================

export const DEFAULT_GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

export const GoogleConfigSchema = z.object({
  /** OAuth client secret JSON downloaded from the Cloud console */
  clientSecretPath: z.string().default('credentials.json'),
  /** Where the authorized-user token is persisted */
  tokenPath: z.string().default('token.json'),
  scopes: z.array(z.string()).min(1).default(DEFAULT_GOOGLE_SCOPES),
  /** Loopback port for the consent callback, 0 picks a free port */
  callbackPort: z.number().int().min(0).max(65535).default(0),
});

export type GoogleConfig = z.infer<typeof GoogleConfigSchema>;

// =============================================================================
// Application Configuration
// =============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const AppConfigSchema = z.object({
  jira: JiraConfigSchema.optional(),
  confluence: ConfluenceConfigSchema.optional(),
  google: GoogleConfigSchema.default({}),
  logLevel: LogLevelSchema.default('info'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
