/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * The generic value tree custom fields are held in after JSON decoding.
 */

import { TableField } from './table';

/**
 * Rich text as sent by the server, e.g. `{ "type": "text/html", "value": "<p>Hi</p>" }`.
 */
export interface TextContent {
	type: string;
	value: string;
}

export const HTML_TEXT = 'text/html';
export const PLAIN_TEXT = 'text/plain';

export function htmlText(html: string): TextContent {
	return { type: HTML_TEXT, value: html };
}

export function plainText(text: string): TextContent {
	return { type: PLAIN_TEXT, value: text };
}

/**
 * A decoded JSON value.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Value of a custom field.
 *
 * `text` and `table` hold values built by the typed setters; everything the
 * server sends arrives as one of the plain JSON members.
 */
export type FieldValue =
	| { type: 'null' }
	| { type: 'boolean'; value: boolean }
	| { type: 'number'; value: number }
	| { type: 'string'; value: string }
	| { type: 'list'; items: FieldValue[] }
	| { type: 'mapping'; entries: Map<string, FieldValue> }
	| { type: 'text'; value: TextContent }
	| { type: 'table'; value: TableField };

const NULL_VALUE: FieldValue = { type: 'null' };

function isPlainObject(raw: object): raw is Record<string, unknown> {
	const proto: unknown = Object.getPrototypeOf(raw);
	return proto === Object.prototype || proto === null;
}

/**
 * Build a field value from decoded JSON.
 *
 * Values JSON cannot represent (undefined, functions, symbols, bigints,
 * non-finite numbers, class instances) become `null`.
 */
export function toFieldValue(raw: unknown): FieldValue {
	if (typeof raw === 'boolean') {
		return { type: 'boolean', value: raw };
	}
	if (typeof raw === 'number') {
		return Number.isFinite(raw) ? { type: 'number', value: raw } : NULL_VALUE;
	}
	if (typeof raw === 'string') {
		return { type: 'string', value: raw };
	}
	if (typeof raw !== 'object' || raw === null) {
		return NULL_VALUE;
	}
	if (Array.isArray(raw)) {
		return { type: 'list', items: raw.map((item: unknown) => toFieldValue(item)) };
	}
	if (raw instanceof TableField) {
		return { type: 'table', value: raw };
	}
	if (!isPlainObject(raw)) {
		return NULL_VALUE;
	}

	const entries = new Map<string, FieldValue>();
	for (const [key, item] of Object.entries(raw)) {
		entries.set(key, toFieldValue(item));
	}
	return { type: 'mapping', entries };
}

/**
 * Turn a field value back into JSON, the shape it is sent to the server in.
 */
export function fromFieldValue(value: FieldValue): JsonValue {
	switch (value.type) {
		case 'null':
			return null;
		case 'boolean':
		case 'number':
		case 'string':
			return value.value;
		case 'list':
			return value.items.map(fromFieldValue);
		case 'mapping':
			return Object.fromEntries(
				Array.from(value.entries, ([key, item]): [string, JsonValue] => [key, fromFieldValue(item)])
			);
		case 'text':
			return { type: value.value.type, value: value.value.value };
		case 'table':
			return value.value.toJSON();
	}
}

/**
 * Look up a key of a mapping value.
 */
export function member(value: FieldValue | undefined, key: string): FieldValue | undefined {
	return value?.type === 'mapping' ? value.entries.get(key) : undefined;
}

/**
 * String content of a value, or `fallback` when it is not a string.
 */
export function stringOr(value: FieldValue | undefined, fallback: string): string {
	return value?.type === 'string' ? value.value : fallback;
}
