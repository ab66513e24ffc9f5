/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Retry logic with exponential backoff and jitter.
 */

import { CancelledError, RetryExhaustedError, isRetryableError } from './errors';

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
	/** Number of retries after the first attempt (default: 1) */
	maxRetries: number;
	/** Wait before the first retry in milliseconds (default: 5000) */
	minWaitMs: number;
	/** Upper bound for the exponential wait in milliseconds (default: 15000) */
	maxWaitMs: number;
	/** Decides whether an error is worth another attempt; retries everything when unset */
	retryIf?: (error: unknown) => boolean;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
	maxRetries: 1,
	minWaitMs: 5000,
	maxWaitMs: 15000,
	retryIf: isRetryableError
});

/**
 * Passed to `onRetry` before each wait.
 */
export interface RetryEvent {
	/** 0-indexed attempt that just failed */
	attempt: number;
	delayMs: number;
	error: unknown;
}

export interface RetrierOptions {
	/** Source of randomness for jitter, in [0, 1) */
	random?: () => number;
	/** Called before every inter-attempt wait */
	onRetry?: (event: RetryEvent) => void;
}

/**
 * Runs an operation, possibly more than once.
 */
export interface Retrier {
	do<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T>;
}

/**
 * Calculate the wait before retry number `attempt` (0-indexed).
 *
 * The exponential delay `minWaitMs * 2^attempt` is capped at `maxWaitMs`, then
 * spread by ±25% so that concurrent callers do not retry in lockstep.
 */
export function calculateBackoff(
	config: Pick<RetryConfig, 'minWaitMs' | 'maxWaitMs'>,
	attempt: number,
	random: () => number = Math.random
): number {
	const exponentialDelay = config.minWaitMs * Math.pow(2, attempt);
	const cappedDelay = Math.min(exponentialDelay, config.maxWaitMs);

	return cappedDelay * 0.75 + random() * (cappedDelay * 0.5);
}

/**
 * Sleep that rejects with `CancelledError` as soon as `signal` aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError('cancelled while waiting to retry', { cause: signal.reason }));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new CancelledError('cancelled while waiting to retry', { cause: signal?.reason }));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Retrier with exponential backoff.
 *
 * @example
 * ```typescript
 * const retrier = new BackoffRetrier({ maxRetries: 3, minWaitMs: 200 });
 * const response = await retrier.do(() => transport.execute(request), signal);
 * ```
 */
export class BackoffRetrier implements Retrier {
	private readonly config: RetryConfig;
	private readonly random: () => number;
	private readonly onRetry?: (event: RetryEvent) => void;

	constructor(config: Partial<RetryConfig> = {}, options: RetrierOptions = {}) {
		this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
		this.random = options.random ?? Math.random;
		this.onRetry = options.onRetry;
	}

	async do<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		const { maxRetries, retryIf } = this.config;
		let lastError: unknown;
		let attempts = 0;

		for (let attempt = 0; attempt <= maxRetries; attempt++) {
			if (signal?.aborted) {
				throw new CancelledError('cancelled before attempt', { cause: signal.reason });
			}

			attempts++;
			try {
				return await operation();
			} catch (error) {
				lastError = error;

				if (retryIf && !retryIf(error)) {
					throw error;
				}
			}

			if (attempt === maxRetries) {
				break;
			}

			if (signal?.aborted) {
				throw new CancelledError('cancelled while waiting to retry', { cause: signal.reason });
			}

			const delayMs = calculateBackoff(this.config, attempt, this.random);
			this.onRetry?.({ attempt, delayMs, error: lastError });
			await sleep(delayMs, signal);
		}

		throw new RetryExhaustedError(attempts, lastError);
	}
}

/**
 * Runs the operation exactly once. For requests that must not be repeated,
 * such as non-idempotent writes.
 */
export class NoRetrier implements Retrier {
	async do<T>(operation: () => Promise<T>): Promise<T> {
		return operation();
	}
}

/**
 * `NoRetrier` when retries are disabled, `BackoffRetrier` otherwise.
 */
export function createRetrier(config: Partial<RetryConfig> = {}, options: RetrierOptions = {}): Retrier {
	const maxRetries = config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries;
	if (maxRetries <= 0) {
		return new NoRetrier();
	}
	return new BackoffRetrier(config, options);
}

/**
 * Retry an async operation with exponential backoff.
 *
 * @returns The result of the first successful attempt
 * @throws The non-retryable error, `RetryExhaustedError` or `CancelledError`
 *
 * @example
 * ```typescript
 * const body = await retry(() => fetchItem(id), { maxRetries: 3, minWaitMs: 100 });
 * ```
 */
export async function retry<T>(
	fn: () => Promise<T>,
	config: Partial<RetryConfig> = {},
	signal?: AbortSignal
): Promise<T> {
	return new BackoffRetrier(config).do(fn, signal);
}
