/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

import {
	ApiError,
	AuthenticatedTransport,
	NoRetrier,
	createRetrier,
	decodeEnvelope,
	decodeRaw,
	discardBody,
	type HttpMethod,
	type ResponseSchema,
	type Retrier
} from '@polarion-sdk/http';
import { resolveClientOptions, type ClientOptions, type ResolvedClientOptions } from './config';
import { createLogger, type Logger } from './logger';

export type QueryValue = string | number | boolean | undefined;

/**
 * Options for individual requests.
 */
export interface RequestOptions {
	/** JSON body */
	body?: unknown;
	/** Query parameters; arrays repeat the parameter, `undefined` leaves it out */
	query?: Readonly<Record<string, QueryValue | readonly QueryValue[]>>;
	headers?: Record<string, string>;
	signal?: AbortSignal;
	/** `false` sends the request exactly once (default: true) */
	retry?: boolean;
}

const NO_RETRY = new NoRetrier();

function isList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
	return Array.isArray(value);
}

function describeError(error: unknown): unknown {
	return error instanceof ApiError ? error.describe() : error;
}

/**
 * Polarion REST API client.
 *
 * @example
 * ```typescript
 * const client = new PolarionClient({
 *   baseUrl: 'https://polarion.example.com/polarion/rest/v1',
 *   token: process.env.POLARION_TOKEN ?? ''
 * });
 *
 * const project = await client.get('/projects/demo', projectSchema);
 * await client.request('PATCH', '/projects/demo/workitems/WI-1', { body, retry: false });
 * ```
 */
export class PolarionClient {
	readonly options: ResolvedClientOptions;
	readonly transport: AuthenticatedTransport;
	readonly retrier: Retrier;
	private readonly logger: Logger;

	constructor(options: ClientOptions) {
		this.options = resolveClientOptions(options);
		this.logger = (this.options.logger ?? createLogger({ level: this.options.logLevel })).withContext({
			component: 'polarion-client'
		});

		this.transport = new AuthenticatedTransport({
			token: this.options.token,
			timeoutMs: this.options.timeoutMs,
			mediaType: this.options.mediaType,
			userAgent: this.options.userAgent,
			fetch: this.options.fetch
		});
		this.retrier = createRetrier(this.options.retry, {
			onRetry: ({ attempt, delayMs, error }) =>
				this.logger.warn('retrying request', { attempt, delayMs, error: describeError(error) })
		});
	}

	/**
	 * Resolve `path` against the base URL. Absolute URLs are used as they are.
	 */
	buildUrl(path: string, query?: RequestOptions['query']): string {
		const url =
			path.startsWith('http://') || path.startsWith('https://')
				? path
				: `${this.options.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`;
		if (!query) {
			return url;
		}

		const params = new URLSearchParams();
		for (const [key, value] of Object.entries(query)) {
			const values = isList(value) ? value : [value];
			for (const item of values) {
				if (item !== undefined) {
					params.append(key, String(item));
				}
			}
		}

		const search = params.toString();
		if (search === '') {
			return url;
		}
		return `${url}${url.includes('?') ? '&' : '?'}${search}`;
	}

	/**
	 * Send a request through the retrier and return the raw response.
	 *
	 * @throws ApiError for status >= 400, RetryExhaustedError when every attempt failed
	 */
	async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<Response> {
		const url = this.buildUrl(path, options.query);
		const retrier = options.retry === false ? NO_RETRY : this.retrier;
		const log = this.logger.withContext({ method, url });
		const started = Date.now();

		log.debug('sending request');
		try {
			const response = await retrier.do(
				() =>
					this.transport.execute({
						method,
						url,
						body: options.body,
						headers: options.headers,
						signal: options.signal
					}),
				options.signal
			);
			log.debug('request completed', { status: response.status, duration: Date.now() - started });
			return response;
		} catch (error) {
			log.error('request failed', { duration: Date.now() - started, error: describeError(error) });
			throw error;
		}
	}

	/**
	 * GET and decode the `data` member.
	 */
	async get<T>(path: string, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
		return decodeEnvelope(await this.request('GET', path, options), schema);
	}

	/**
	 * GET and decode the whole body, for endpoints that answer without an envelope.
	 */
	async getRaw<T>(path: string, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
		return decodeRaw(await this.request('GET', path, options), schema);
	}

	async post<T>(path: string, body: unknown, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
		return decodeEnvelope(await this.request('POST', path, { ...options, body }), schema);
	}

	async patch<T>(path: string, body: unknown, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
		return decodeEnvelope(await this.request('PATCH', path, { ...options, body }), schema);
	}

	async delete(path: string, options?: RequestOptions): Promise<void> {
		await discardBody(await this.request('DELETE', path, options));
	}
}
