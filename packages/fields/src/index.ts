/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Typed access to Polarion custom fields.
 *
 * This package provides:
 * - A generic value tree for decoded custom field JSON
 * - Best-effort coercion to string, number, boolean, rich text, date/time,
 *   duration and table kinds
 * - Decoding and encoding of JSON:API relationship references
 * - zod schemas mapping custom fields to typed objects
 */

export { CustomFields } from './custom-fields';
export {
	HTML_TEXT,
	PLAIN_TEXT,
	fromFieldValue,
	htmlText,
	plainText,
	toFieldValue,
	type FieldValue,
	type JsonValue,
	type TextContent
} from './value';
export {
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
export {
	RESOURCE_KINDS,
	decodeReference,
	decodeReferences,
	encodeReference,
	encodeReferences,
	kindOfWireType,
	projectScopedId,
	reference,
	splitProjectScopedId,
	wireType,
	type RelationshipReference,
	type ResourceKind
} from './relationships';
export { DateOnly, DateTime, Duration, TimeOnly } from './temporal';
export { TableField, type TableJson, type TableRow } from './table';
export {
	customField,
	loadCustomFields,
	mergeCustomFields,
	saveCustomFields,
	splitCustomFields,
	type FieldInput
} from './mapper';
export { FieldsError, FieldFormatError, MappingError, TableAccessError } from './errors';
