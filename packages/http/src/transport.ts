/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Authenticated transport for the Polarion REST API.
 */

import { z } from 'zod';
import { ApiError, CancelledError, NetworkError, TimeoutError, type ErrorDetail } from './errors';

/**
 * Media type the Polarion REST API negotiates for JSON:API payloads.
 */
export const POLARION_MEDIA_TYPE = 'application/json';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Options for creating an AuthenticatedTransport.
 */
export interface TransportOptions {
	/** Bearer token sent with every request (required) */
	token: string;
	/** Request timeout in milliseconds (default: 30000) */
	timeoutMs?: number;
	/** Content-Type and Accept value (default: application/json) */
	mediaType?: string;
	/** User-Agent header (default: polarion-sdk/{version}) */
	userAgent?: string;
	/** fetch implementation (default: global fetch) */
	fetch?: typeof fetch;
}

/**
 * A single outbound call.
 */
export interface TransportRequest {
	method: HttpMethod;
	/** Absolute URL */
	url: string;
	/** JSON-serializable body */
	body?: unknown;
	/** Headers that take precedence over the negotiated defaults */
	headers?: Readonly<Record<string, string>>;
	/** AbortSignal forwarded to fetch */
	signal?: AbortSignal;
}

const errorEntrySchema = z.object({
	status: z.union([z.string(), z.number()]).transform(String),
	title: z.string().nullish(),
	detail: z.string().nullish(),
	pointer: z.string().nullish(),
	source: z.object({ pointer: z.string().nullish() }).nullish()
});

const errorEnvelopeSchema = z.object({
	errors: z.array(errorEntrySchema)
});

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/**
 * Read the body as text, giving up as soon as `signal` aborts.
 */
function readText(response: Response, signal: AbortSignal): Promise<string> {
	return new Promise((resolve, reject) => {
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}

		const onAbort = () => reject(signal.reason);
		signal.addEventListener('abort', onAbort, { once: true });
		void response.text().then(
			(text) => {
				signal.removeEventListener('abort', onAbort);
				resolve(text);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			}
		);
	});
}

/**
 * Extract the JSON:API error entries from a response body, or undefined when
 * the body is not such an envelope.
 */
export function parseErrorEnvelope(body: string): ErrorDetail[] | undefined {
	const parsed = errorEnvelopeSchema.safeParse(parseJson(body));
	if (!parsed.success) {
		return undefined;
	}

	return parsed.data.errors.map((entry) => {
		const detail: ErrorDetail = { status: entry.status, detail: entry.detail ?? '' };
		if (entry.title !== undefined && entry.title !== null) {
			detail.title = entry.title;
		}
		const pointer = entry.pointer ?? entry.source?.pointer;
		if (pointer !== undefined && pointer !== null) {
			detail.pointer = pointer;
		}
		return detail;
	});
}

/**
 * Attaches credentials and content negotiation to each request, executes it
 * and turns error responses into `ApiError`. It never retries; wrap
 * `execute` in a `Retrier` for that.
 *
 * @example
 * ```typescript
 * const transport = new AuthenticatedTransport({ token: 'test-token' });
 * const response = await transport.execute({
 *   method: 'GET',
 *   url: 'https://polarion.example.com/polarion/rest/v1/projects/demo'
 * });
 * ```
 */
export class AuthenticatedTransport {
	private readonly token: string;
	private readonly timeoutMs: number;
	private readonly mediaType: string;
	private readonly userAgent: string;
	private readonly fetchImpl: typeof fetch;

	constructor(options: TransportOptions) {
		this.token = options.token;
		this.timeoutMs = options.timeoutMs ?? 30000;
		this.mediaType = options.mediaType ?? POLARION_MEDIA_TYPE;
		this.userAgent = options.userAgent ?? 'polarion-sdk/0.1.0';
		this.fetchImpl = options.fetch ?? fetch;
	}

	/**
	 * Execute a request. Resolves with the untouched response when the status
	 * is below 400.
	 *
	 * @throws ApiError for status >= 400
	 * @throws NetworkError when no response arrived
	 * @throws TimeoutError or CancelledError when the deadline or the caller's
	 * signal cut the call short, including while an error body is read
	 */
	async execute(request: TransportRequest): Promise<Response> {
		const init: RequestInit = {
			method: request.method,
			headers: this.buildHeaders(request.headers)
		};
		if (request.body !== undefined) {
			init.body = JSON.stringify(request.body);
		}

		const externalSignal = request.signal;
		if (externalSignal?.aborted) {
			throw new CancelledError('request aborted', { cause: externalSignal.reason });
		}

		const controller = new AbortController();
		const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
		const forwardAbort = () => controller.abort();
		externalSignal?.addEventListener('abort', forwardAbort, { once: true });

		// The deadline covers the error body as well as the headers.
		try {
			let response: Response;
			try {
				response = await this.fetchImpl(request.url, { ...init, signal: controller.signal });
			} catch (error) {
				throw this.abortError(controller.signal, externalSignal) ??
					new NetworkError('http request failed', { cause: error });
			}

			if (response.status >= 400) {
				throw await this.toApiError(response, request, controller.signal);
			}
			return response;
		} finally {
			clearTimeout(timeout);
			externalSignal?.removeEventListener('abort', forwardAbort);
		}
	}

	/**
	 * Build a fresh header set; the caller's headers are copied, never mutated.
	 */
	private buildHeaders(overrides?: Readonly<Record<string, string>>): Headers {
		const headers = new Headers();

		if (overrides) {
			for (const [key, value] of Object.entries(overrides)) {
				headers.set(key, value);
			}
		}

		headers.set('Authorization', `Bearer ${this.token}`);
		if (!headers.has('Content-Type')) {
			headers.set('Content-Type', this.mediaType);
		}
		if (!headers.has('Accept')) {
			headers.set('Accept', this.mediaType);
		}
		if (!headers.has('User-Agent')) {
			headers.set('User-Agent', this.userAgent);
		}

		return headers;
	}

	/**
	 * The error for an aborted call, or undefined when nothing aborted.
	 */
	private abortError(
		signal: AbortSignal,
		externalSignal?: AbortSignal
	): CancelledError | TimeoutError | undefined {
		if (externalSignal?.aborted) {
			return new CancelledError('request aborted', { cause: externalSignal.reason });
		}
		if (signal.aborted) {
			return new TimeoutError(`request timed out after ${this.timeoutMs}ms`, this.timeoutMs);
		}
		return undefined;
	}

	/**
	 * Buffer the error body and classify it.
	 */
	private async toApiError(
		response: Response,
		request: TransportRequest,
		signal: AbortSignal
	): Promise<ApiError | CancelledError | TimeoutError> {
		const base = {
			statusCode: response.status,
			statusText: response.statusText,
			method: request.method,
			url: request.url
		};

		let body: string;
		try {
			body = await readText(response, signal);
		} catch (error) {
			const aborted = this.abortError(signal, request.signal);
			if (aborted) {
				return aborted;
			}
			return new ApiError('failed to read error response', { ...base, cause: error });
		}

		const details = parseErrorEnvelope(body);
		if (details && details.length > 0) {
			const statusLine = `${response.status} ${response.statusText}`.trim();
			return new ApiError(statusLine, { ...base, details, rawBody: body });
		}

		return new ApiError(body, { ...base, rawBody: body });
	}
}
