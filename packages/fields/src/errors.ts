/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Error types for custom field values.
 *
 * Reading a custom field never throws; these are raised by explicit
 * parsing, table access and the schema mapper.
 */

/**
 * Base error for the fields package.
 */
export class FieldsError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = 'FieldsError';
	}
}

/**
 * A string could not be parsed as a field value, or a value was out of range.
 */
export class FieldFormatError extends FieldsError {
	readonly input: string;

	constructor(message: string, input: string) {
		super(message);
		this.name = 'FieldFormatError';
		this.input = input;
	}
}

/**
 * A table row, column or key does not exist.
 */
export class TableAccessError extends FieldsError {
	constructor(message: string) {
		super(message);
		this.name = 'TableAccessError';
	}
}

/**
 * Custom fields did not satisfy a mapping schema.
 */
export class MappingError extends FieldsError {
	readonly issues: string[];

	constructor(message: string, options: { issues: string[]; cause?: unknown }) {
		super(message, { cause: options.cause });
		this.name = 'MappingError';
		this.issues = options.issues;
	}
}
