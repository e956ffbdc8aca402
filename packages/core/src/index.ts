/**
 * @flowkit/core
 *
 * Shared building blocks for the flowkit integrations:
 * - Configuration loading and validation
 * - Structured logging with Winston
 * - CSV export and console tables
 */

export * from './config/index.js';

export * from './logger/index.js';

export * from './csv/index.js';
