/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Decoding of successful responses.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { DecodeError } from './errors';

/**
 * Any zod schema whose input is a decoded JSON value.
 */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

async function readJson(response: Response): Promise<unknown> {
	if (response.bodyUsed) {
		throw new DecodeError('response body already consumed');
	}

	let text: string;
	try {
		text = await response.text();
	} catch (error) {
		throw new DecodeError('failed to read response body', { cause: error });
	}

	try {
		return JSON.parse(text);
	} catch (error) {
		throw new DecodeError('failed to decode response: body is not valid JSON', { cause: error });
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a `{ "data": ... }` envelope and validate `data` against `schema`.
 *
 * @example
 * ```typescript
 * const project = await decodeEnvelope(response, z.object({ id: z.string() }));
 * ```
 */
export async function decodeEnvelope<T>(response: Response, schema: ResponseSchema<T>): Promise<T> {
	const body = await readJson(response);
	if (!isRecord(body) || !('data' in body)) {
		throw new DecodeError('failed to decode response wrapper: missing "data"');
	}

	const parsed = schema.safeParse(body.data);
	if (!parsed.success) {
		throw new DecodeError(`failed to decode response data: ${parsed.error.message}`, {
			cause: parsed.error
		});
	}
	return parsed.data;
}

/**
 * Validate the whole response body against `schema`.
 */
export async function decodeRaw<T>(response: Response, schema: ResponseSchema<T>): Promise<T> {
	const body = await readJson(response);

	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		throw new DecodeError(`failed to decode response: ${parsed.error.message}`, {
			cause: parsed.error
		});
	}
	return parsed.data;
}

/**
 * Consume and release a body that is not going to be decoded.
 */
export async function discardBody(response: Response): Promise<void> {
	if (response.bodyUsed) {
		return;
	}
	await response.arrayBuffer();
}
