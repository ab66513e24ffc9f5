/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Error types for the Polarion request core.
 */

/**
 * A single entry of a JSON:API error response.
 *
 * `pointer` is a JSON pointer into the offending payload, e.g.
 * `/data/0/attributes/customFields/myField`.
 */
export interface ErrorDetail {
	status: string;
	title?: string;
	detail: string;
	pointer?: string;
}

/**
 * Render an error detail the way it is shown in error messages.
 */
export function formatErrorDetail(detail: ErrorDetail): string {
	if (detail.pointer) {
		return `[${detail.status}] ${detail.detail} (at ${detail.pointer})`;
	}
	if (detail.title) {
		return `[${detail.status}] ${detail.title}: ${detail.detail}`;
	}
	return `[${detail.status}] ${detail.detail}`;
}

/**
 * Base error for everything the request core throws.
 */
export class PolarionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = 'PolarionError';
	}

	/**
	 * Returns true if repeating the failed call may succeed.
	 */
	isRetryable(): boolean {
		return false;
	}
}

/**
 * A response with status >= 400.
 */
export class ApiError extends PolarionError {
	readonly statusCode: number;
	readonly statusText?: string;
	readonly details: readonly ErrorDetail[];
	readonly rawBody?: string;
	readonly method?: string;
	readonly url?: string;

	constructor(
		message: string,
		options: {
			statusCode: number;
			statusText?: string;
			details?: readonly ErrorDetail[];
			rawBody?: string;
			method?: string;
			url?: string;
			cause?: unknown;
		}
	) {
		super(message, { cause: options.cause });
		this.name = 'ApiError';
		this.statusCode = options.statusCode;
		this.statusText = options.statusText;
		this.details = options.details ?? [];
		this.rawBody = options.rawBody;
		this.method = options.method;
		this.url = options.url;
	}

	/**
	 * Rate limiting and server errors are worth another attempt, other client
	 * errors are not.
	 */
	override isRetryable(): boolean {
		if (this.statusCode >= 400 && this.statusCode < 500) {
			return this.statusCode === 429;
		}
		return this.statusCode >= 500;
	}

	/**
	 * One-line summary with the request and every detail entry.
	 */
	describe(): string {
		const target = `${this.method ?? ''} ${this.url ?? ''}`.trim();
		const prefix = `polarion api error (status ${this.statusCode})${target ? ` for ${target}` : ''}: ${this.message}`;
		if (this.details.length === 0) {
			return prefix;
		}

		const details = this.details
			.map((detail) => {
				if (detail.pointer) {
					return `field '${detail.pointer}': ${detail.detail}`;
				}
				if (detail.title) {
					return `${detail.title}: ${detail.detail}`;
				}
				return detail.detail;
			})
			.join('; ');
		return `${prefix} - ${details}`;
	}

	/**
	 * `describe()` plus the raw response body when it is small enough to read.
	 */
	detailedMessage(): string {
		const base = this.describe();
		if (this.rawBody && this.rawBody.length < 1000) {
			return `${base}\nRaw response: ${this.rawBody}`;
		}
		return base;
	}
}

/**
 * The request failed before any response was received.
 */
export class NetworkError extends PolarionError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'NetworkError';
	}

	override isRetryable(): boolean {
		return true;
	}
}

/**
 * The transport gave up waiting for a response.
 */
export class TimeoutError extends PolarionError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number) {
		super(message);
		this.name = 'TimeoutError';
		this.timeoutMs = timeoutMs;
	}

	override isRetryable(): boolean {
		return true;
	}
}

/**
 * A response body did not have the expected shape. Never retried.
 */
export class DecodeError extends PolarionError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'DecodeError';
	}
}

/**
 * Every allowed attempt failed. `cause` holds the last underlying error.
 */
export class RetryExhaustedError extends PolarionError {
	readonly attempts: number;

	constructor(attempts: number, lastError: unknown) {
		const reason = lastError instanceof Error ? lastError.message : String(lastError);
		super(`max retries exceeded after ${attempts} attempts: ${reason}`, { cause: lastError });
		this.name = 'RetryExhaustedError';
		this.attempts = attempts;
	}
}

/**
 * The caller's abort signal fired.
 */
export class CancelledError extends PolarionError {
	constructor(message = 'operation cancelled', options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'CancelledError';
	}
}

/**
 * Default retry predicate.
 *
 * Errors that did not come from this package are treated as transport-level
 * failures and retried.
 */
export function isRetryableError(error: unknown): boolean {
	if (error instanceof PolarionError) {
		return error.isRetryable();
	}
	return true;
}

/**
 * Find the `ApiError` in an error or its chain of causes.
 */
export function asApiError(error: unknown): ApiError | undefined {
	let current: unknown = error;
	while (current instanceof Error) {
		if (current instanceof ApiError) {
			return current;
		}
		current = current.cause;
	}
	return undefined;
}

/**
 * True when the error is (or wraps) a 404 response.
 */
export function isNotFound(error: unknown): boolean {
	return asApiError(error)?.statusCode === 404;
}

/**
 * Detail entries of a wrapped `ApiError`, empty for any other error.
 */
export function getErrorDetails(error: unknown): readonly ErrorDetail[] {
	return asApiError(error)?.details ?? [];
}
