/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Client configuration.
 */

import { z } from 'zod';
import { DEFAULT_RETRY_CONFIG, POLARION_MEDIA_TYPE, PolarionError, type RetryConfig } from '@polarion-sdk/http';
import { LOG_LEVELS, type LogLevel, type Logger } from './logger';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT = 'polarion-sdk/0.1.0';

/**
 * Client options are missing or invalid.
 */
export class ConfigError extends PolarionError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export interface ClientOptions {
	/** REST API root, e.g. `https://polarion.example.com/polarion/rest/v1` */
	baseUrl: string;
	/** Personal access token sent as a bearer token */
	token: string;
	/** Per-request timeout in milliseconds (default: 30000) */
	timeoutMs?: number;
	retry?: Partial<RetryConfig>;
	/** Content-Type and Accept of every request (default: application/json) */
	mediaType?: string;
	userAgent?: string;
	fetch?: typeof fetch;
	/** Level of the default logger (default: info) */
	logLevel?: LogLevel;
	/** Replaces the default stderr logger */
	logger?: Logger;
}

export interface ResolvedClientOptions {
	baseUrl: string;
	token: string;
	timeoutMs: number;
	retry: RetryConfig;
	mediaType: string;
	userAgent: string;
	fetch?: typeof fetch;
	logLevel: LogLevel;
	logger?: Logger;
}

const retrySchema = z
	.object({
		maxRetries: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxRetries),
		minWaitMs: z.number().min(0).default(DEFAULT_RETRY_CONFIG.minWaitMs),
		maxWaitMs: z.number().min(0).default(DEFAULT_RETRY_CONFIG.maxWaitMs)
	})
	.refine((retry) => retry.maxWaitMs >= retry.minWaitMs, {
		message: 'must not be less than minWaitMs',
		path: ['maxWaitMs']
	});

const optionsSchema = z.object({
	baseUrl: z
		.string()
		.url()
		.transform((url) => url.replace(/\/+$/, '')),
	token: z.string().min(1, 'must not be empty'),
	timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
	retry: retrySchema.default({}),
	mediaType: z.string().min(1).default(POLARION_MEDIA_TYPE),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
	logLevel: z.enum(LOG_LEVELS).default('info')
});

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate options and fill in defaults.
 *
 * @throws {ConfigError} listing every invalid option
 */
export function resolveClientOptions(options: ClientOptions): ResolvedClientOptions {
	const parsed = optionsSchema.safeParse({
		baseUrl: options.baseUrl,
		token: options.token,
		timeoutMs: options.timeoutMs,
		retry: {
			maxRetries: options.retry?.maxRetries,
			minWaitMs: options.retry?.minWaitMs,
			maxWaitMs: options.retry?.maxWaitMs
		},
		mediaType: options.mediaType,
		userAgent: options.userAgent,
		logLevel: options.logLevel
	});
	if (!parsed.success) {
		const issues = formatIssues(parsed.error);
		throw new ConfigError(`invalid client options: ${issues.join('; ')}`, issues);
	}

	return {
		...parsed.data,
		retry: { ...parsed.data.retry, retryIf: options.retry?.retryIf ?? DEFAULT_RETRY_CONFIG.retryIf },
		fetch: options.fetch,
		logger: options.logger
	};
}

const envSchema = z.object({
	POLARION_BASE_URL: z.string({ required_error: 'is required' }),
	POLARION_TOKEN: z.string({ required_error: 'is required' }),
	POLARION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	POLARION_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
	POLARION_LOG_LEVEL: z.enum(LOG_LEVELS).optional()
});

/**
 * Read client options from `POLARION_*` environment variables.
 *
 * @example
 * ```typescript
 * const client = new PolarionClient(loadClientOptionsFromEnv());
 * ```
 *
 * @throws {ConfigError} when a variable is missing or malformed
 */
export function loadClientOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const issues = formatIssues(parsed.error);
		throw new ConfigError(`invalid environment: ${issues.join('; ')}`, issues);
	}

	const vars = parsed.data;
	return {
		baseUrl: vars.POLARION_BASE_URL,
		token: vars.POLARION_TOKEN,
		timeoutMs: vars.POLARION_TIMEOUT_MS,
		retry: vars.POLARION_MAX_RETRIES === undefined ? undefined : { maxRetries: vars.POLARION_MAX_RETRIES },
		logLevel: vars.POLARION_LOG_LEVEL
	};
}
