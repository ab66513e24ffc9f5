/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Mapping between custom fields and typed objects.
 *
 * @example
 * ```typescript
 * const Requirement = z.object({
 *   storyPoints: customField.int(),
 *   dueDate: customField.dateOnly(),
 *   owner: customField.relationship()
 * });
 *
 * const req = loadCustomFields(workItem.customFields, Requirement);
 * saveCustomFields(workItem.customFields, { storyPoints: 5, owner: undefined });
 * ```
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
	coerceBool,
	coerceDateOnly,
	coerceDateTime,
	coerceDuration,
	coerceFloat,
	coerceInt,
	coerceString,
	coerceTable,
	coerceText,
	coerceTimeOnly
} from './coerce';
import { CustomFields } from './custom-fields';
import { MappingError } from './errors';
import { decodeReference, decodeReferences, type RelationshipReference } from './relationships';
import { TableField } from './table';
import { DateOnly, DateTime, Duration, TimeOnly } from './temporal';
import { toFieldValue, type FieldValue, type TextContent } from './value';

function field<T>(coerce: (value: FieldValue) => T) {
	return z.unknown().transform((raw) => coerce(toFieldValue(raw)));
}

/**
 * Schemas reading one custom field with the same rules as the `CustomFields`
 * getters. A field that is missing or does not fit maps to `undefined`; chain
 * `.pipe(...)` to require or constrain it.
 */
export const customField = {
	string: () => field(coerceString),
	enum: () => field(coerceString),
	int: () => field(coerceInt),
	float: () => field(coerceFloat),
	bool: () => field(coerceBool),
	text: () => field(coerceText),
	timeOnly: () => field(coerceTimeOnly),
	dateOnly: () => field(coerceDateOnly),
	dateTime: () => field(coerceDateTime),
	duration: () => field(coerceDuration),
	table: () => field(coerceTable),
	relationship: () => field(decodeReference),
	relationships: () => field(decodeReferences)
};

/**
 * Read custom fields into the shape of `schema`.
 *
 * @throws {MappingError} when the fields do not satisfy the schema
 */
export function loadCustomFields<T>(fields: CustomFields, schema: ZodType<T, ZodTypeDef, unknown>): T {
	const parsed = schema.safeParse(fields.toJSON());
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		throw new MappingError(`failed to map custom fields: ${issues.join('; ')}`, {
			issues,
			cause: parsed.error
		});
	}
	return parsed.data;
}

/**
 * A typed value that can be written to a custom field.
 */
export type FieldInput =
	| string
	| number
	| boolean
	| TextContent
	| TableField
	| TimeOnly
	| DateOnly
	| DateTime
	| Duration
	| RelationshipReference
	| RelationshipReference[];

/**
 * Write typed values. `undefined` removes the field; dates, times and
 * durations are stored in their string form.
 */
export function saveCustomFields(fields: CustomFields, values: Readonly<Record<string, FieldInput | undefined>>): void {
	for (const [key, value] of Object.entries(values)) {
		if (value === undefined) {
			fields.delete(key);
		} else if (typeof value === 'string') {
			fields.setString(key, value);
		} else if (typeof value === 'number') {
			fields.setFloat(key, value);
		} else if (typeof value === 'boolean') {
			fields.setBool(key, value);
		} else if (value instanceof TableField) {
			fields.setTable(key, value);
		} else if (value instanceof TimeOnly) {
			fields.setTimeOnly(key, value);
		} else if (value instanceof DateOnly) {
			fields.setDateOnly(key, value);
		} else if (value instanceof DateTime) {
			fields.setDateTime(key, value);
		} else if (value instanceof Duration) {
			fields.setDuration(key, value);
		} else if (Array.isArray(value)) {
			fields.setRelationships(key, value);
		} else if ('kind' in value) {
			fields.setRelationship(key, value);
		} else {
			fields.setText(key, value);
		}
	}
}

/**
 * Separate the custom fields from the standard attributes they are sent beside.
 */
export function splitCustomFields(
	attributes: Readonly<Record<string, unknown>>,
	standardKeys: Iterable<string>
): { standard: Record<string, unknown>; custom: CustomFields } {
	const known = new Set(standardKeys);
	const entries = Object.entries(attributes);

	const custom = new CustomFields();
	for (const [key, value] of entries) {
		if (!known.has(key)) {
			custom.set(key, toFieldValue(value));
		}
	}
	return { standard: Object.fromEntries(entries.filter(([key]) => known.has(key))), custom };
}

/**
 * Flatten custom fields back beside the standard attributes. A standard
 * attribute wins over a custom field of the same name.
 */
export function mergeCustomFields(
	standard: Readonly<Record<string, unknown>>,
	custom: CustomFields
): Record<string, unknown> {
	return { ...custom.toJSON(), ...standard };
}
