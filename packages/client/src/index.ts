/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Polarion REST API client.
 *
 * Composes the authenticated transport, retrier and response decoder of
 * `@polarion-sdk/http` behind validated configuration and structured
 * logging, and re-exports the request core and `@polarion-sdk/fields`.
 */

export { PolarionClient, type QueryValue, type RequestOptions } from './client';
export {
	ConfigError,
	DEFAULT_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
	loadClientOptionsFromEnv,
	resolveClientOptions,
	type ClientOptions,
	type ResolvedClientOptions
} from './config';
export {
	LOG_LEVELS,
	createLogger,
	sanitizeContext,
	type LogContext,
	type LogEntry,
	type LogLevel,
	type Logger,
	type LoggerOptions
} from './logger';
export * from '@polarion-sdk/http';
export * from '@polarion-sdk/fields';
