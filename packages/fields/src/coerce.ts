/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Coercion of field values to the kinds custom fields are declared with.
 *
 * The server encodes the same kind in several shapes depending on project
 * configuration. Each coercion accepts every shape it knows and answers
 * `undefined` for anything else; none of them throw.
 */

import { TableField, type TableRow } from './table';
import { DateOnly, DateTime, Duration, TimeOnly } from './temporal';
import { member, stringOr, type FieldValue, type TextContent } from './value';

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function coerceString(value: FieldValue | undefined): string | undefined {
	return value?.type === 'string' ? value.value : undefined;
}

/**
 * Numbers only, truncated toward zero. Numeric strings are not accepted.
 */
export function coerceInt(value: FieldValue | undefined): number | undefined {
	if (value?.type !== 'number' || !Number.isFinite(value.value)) {
		return undefined;
	}
	return Math.trunc(value.value);
}

/**
 * Numbers, or strings holding a decimal number (currency fields arrive as strings).
 */
export function coerceFloat(value: FieldValue | undefined): number | undefined {
	if (value?.type === 'number') {
		return Number.isFinite(value.value) ? value.value : undefined;
	}
	if (value?.type === 'string' && DECIMAL.test(value.value)) {
		return Number(value.value);
	}
	return undefined;
}

export function coerceBool(value: FieldValue | undefined): boolean | undefined {
	return value?.type === 'boolean' ? value.value : undefined;
}

function textFromMapping(value: FieldValue | undefined): TextContent {
	return {
		type: stringOr(member(value, 'type'), ''),
		value: stringOr(member(value, 'value'), '')
	};
}

export function coerceText(value: FieldValue | undefined): TextContent | undefined {
	if (value?.type === 'text') {
		return value.value;
	}
	if (value?.type === 'mapping') {
		return textFromMapping(value);
	}
	return undefined;
}

export function coerceTimeOnly(value: FieldValue | undefined): TimeOnly | undefined {
	const text = coerceString(value);
	return text === undefined ? undefined : TimeOnly.tryParse(text);
}

export function coerceDateOnly(value: FieldValue | undefined): DateOnly | undefined {
	const text = coerceString(value);
	return text === undefined ? undefined : DateOnly.tryParse(text);
}

export function coerceDateTime(value: FieldValue | undefined): DateTime | undefined {
	const text = coerceString(value);
	return text === undefined ? undefined : DateTime.tryParse(text);
}

export function coerceDuration(value: FieldValue | undefined): Duration | undefined {
	const text = coerceString(value);
	return text === undefined ? undefined : Duration.tryParse(text);
}

function rowFromValue(value: FieldValue): TableRow {
	const cells = member(value, 'values');
	if (cells?.type !== 'list') {
		return { values: [] };
	}
	return {
		values: cells.items.map((cell) =>
			cell.type === 'mapping' ? textFromMapping(cell) : { type: '', value: '' }
		)
	};
}

/**
 * A table built by a setter, or the `{ keys, rows: [{ values }] }` mapping.
 *
 * Malformed rows become empty rows and malformed cells empty text, so one
 * bad cell does not hide the rest of the table.
 */
export function coerceTable(value: FieldValue | undefined): TableField | undefined {
	if (value?.type === 'table') {
		return value.value;
	}
	if (value?.type !== 'mapping') {
		return undefined;
	}

	const keys = member(value, 'keys');
	const rows = member(value, 'rows');
	return new TableField(
		keys?.type === 'list' ? keys.items.map((key) => stringOr(key, '')) : [],
		rows?.type === 'list' ? rows.items.map(rowFromValue) : []
	);
}
