/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * JSON line logging to stderr.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
	method?: string;
	url?: string;
	status?: number;
	attempt?: number;
	delayMs?: number;
	duration?: number;
	[key: string]: unknown;
}

export interface LogEntry {
	ts: string;
	level: LogLevel;
	message: string;
	context: LogContext;
}

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
	withContext(context: LogContext): Logger;
}

export interface LoggerOptions {
	/** Entries below this level are dropped. Defaults to `info`. */
	level?: LogLevel;
	/** Receives each formatted line. Defaults to stderr. */
	write?: (line: string) => void;
	now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3
};

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization'];

function isSensitive(key: string): boolean {
	const lower = key.toLowerCase();
	return SENSITIVE_KEYS.some((word) => lower.includes(word));
}

function sanitizeValue(value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	if (typeof value === 'object' && value !== null) {
		try {
			JSON.stringify(value);
			return value;
		} catch {
			return '[Unserializable]';
		}
	}
	if (typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') {
		return String(value);
	}
	return value;
}

export function sanitizeContext(context: LogContext): LogContext {
	const sanitized: LogContext = {};

	for (const [key, value] of Object.entries(context)) {
		if (value === undefined || value === null) continue;

		sanitized[key] = isSensitive(key) ? '[REDACTED]' : sanitizeValue(value);
	}

	return sanitized;
}

function writeToStderr(line: string): void {
	console.error(line);
}

/**
 * Create a logger writing one JSON object per line.
 *
 * @example
 * ```typescript
 * const log = createLogger({ level: 'debug' }).withContext({ component: 'client' });
 * log.warn('retrying request', { attempt: 1, delayMs: 4000 });
 * // {"ts":"...","level":"warn","message":"retrying request","context":{"component":"client","attempt":1,"delayMs":4000}}
 * ```
 */
export function createLogger(options: LoggerOptions = {}, baseContext: LogContext = {}): Logger {
	const minLevel = options.level ?? 'info';
	const write = options.write ?? writeToStderr;
	const now = options.now ?? (() => new Date());

	function log(level: LogLevel, message: string, context?: LogContext): void {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

		const entry: LogEntry = {
			ts: now().toISOString(),
			level,
			message,
			context: sanitizeContext({ ...baseContext, ...context })
		};
		write(JSON.stringify(entry));
	}

	return {
		debug: (message, context) => log('debug', message, context),
		info: (message, context) => log('info', message, context),
		warn: (message, context) => log('warn', message, context),
		error: (message, context) => log('error', message, context),
		withContext: (context) => createLogger(options, { ...baseContext, ...context })
	};
}
