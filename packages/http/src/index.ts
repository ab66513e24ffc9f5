/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Request core for the Polarion REST API.
 *
 * This package provides:
 * - An authenticated transport that normalizes JSON:API error responses
 * - Retry logic with exponential backoff, jitter and cancellation
 * - Decoding of `{ "data": ... }` envelopes against zod schemas
 */

export {
	AuthenticatedTransport,
	POLARION_MEDIA_TYPE,
	parseErrorEnvelope,
	type HttpMethod,
	type TransportOptions,
	type TransportRequest
} from './transport';
export {
	BackoffRetrier,
	NoRetrier,
	DEFAULT_RETRY_CONFIG,
	calculateBackoff,
	createRetrier,
	retry,
	type Retrier,
	type RetrierOptions,
	type RetryConfig,
	type RetryEvent
} from './retry';
export { decodeEnvelope, decodeRaw, discardBody, type ResponseSchema } from './decode';
export {
	PolarionError,
	ApiError,
	NetworkError,
	TimeoutError,
	DecodeError,
	RetryExhaustedError,
	CancelledError,
	asApiError,
	formatErrorDetail,
	getErrorDetails,
	isNotFound,
	isRetryableError,
	type ErrorDetail
} from './errors';
