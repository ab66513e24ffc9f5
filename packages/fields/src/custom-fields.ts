/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

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
import {
	decodeReference,
	decodeReferences,
	encodeReference,
	encodeReferences,
	type RelationshipReference
} from './relationships';
import type { TableField } from './table';
import type { DateOnly, DateTime, Duration, TimeOnly } from './temporal';
import { fromFieldValue, toFieldValue, type FieldValue, type JsonValue, type TextContent } from './value';

/**
 * Custom fields of one entity, keyed by field id.
 *
 * Getters answer `undefined` when the key is missing, the value is null or
 * its shape does not fit the requested kind. They never throw.
 *
 * @example
 * ```typescript
 * const fields = CustomFields.fromJSON({ storyPoints: 3.9, price: '12.50' });
 * fields.getInt('storyPoints'); // 3
 * fields.getFloat('price'); // 12.5
 * ```
 */
export class CustomFields {
	private readonly values = new Map<string, FieldValue>();

	constructor(entries?: Iterable<readonly [string, FieldValue]>) {
		for (const [key, value] of entries ?? []) {
			this.values.set(key, value);
		}
	}

	/**
	 * Build from the decoded JSON object the server sent.
	 */
	static fromJSON(record: Record<string, unknown> | null | undefined): CustomFields {
		const fields = new CustomFields();
		for (const [key, value] of Object.entries(record ?? {})) {
			fields.set(key, toFieldValue(value));
		}
		return fields;
	}

	get size(): number {
		return this.values.size;
	}

	keys(): string[] {
		return Array.from(this.values.keys());
	}

	/**
	 * True for every stored key, null values included.
	 */
	has(key: string): boolean {
		return this.values.has(key);
	}

	get(key: string): FieldValue | undefined {
		return this.values.get(key);
	}

	set(key: string, value: FieldValue): void {
		this.values.set(key, value);
	}

	delete(key: string): boolean {
		return this.values.delete(key);
	}

	getString(key: string): string | undefined {
		return coerceString(this.get(key));
	}

	getEnum(key: string): string | undefined {
		return this.getString(key);
	}

	getInt(key: string): number | undefined {
		return coerceInt(this.get(key));
	}

	getFloat(key: string): number | undefined {
		return coerceFloat(this.get(key));
	}

	getBool(key: string): boolean | undefined {
		return coerceBool(this.get(key));
	}

	getText(key: string): TextContent | undefined {
		return coerceText(this.get(key));
	}

	getTimeOnly(key: string): TimeOnly | undefined {
		return coerceTimeOnly(this.get(key));
	}

	getDateOnly(key: string): DateOnly | undefined {
		return coerceDateOnly(this.get(key));
	}

	getDateTime(key: string): DateTime | undefined {
		return coerceDateTime(this.get(key));
	}

	getDuration(key: string): Duration | undefined {
		return coerceDuration(this.get(key));
	}

	getTable(key: string): TableField | undefined {
		return coerceTable(this.get(key));
	}

	getRelationship(key: string): RelationshipReference | undefined {
		return decodeReference(this.get(key));
	}

	getRelationships(key: string): RelationshipReference[] {
		return decodeReferences(this.get(key));
	}

	setString(key: string, value: string): void {
		this.set(key, { type: 'string', value });
	}

	setEnum(key: string, value: string): void {
		this.setString(key, value);
	}

	/**
	 * Stores `value` truncated toward zero.
	 */
	setInt(key: string, value: number): void {
		this.set(key, toFieldValue(Math.trunc(value)));
	}

	setFloat(key: string, value: number): void {
		this.set(key, toFieldValue(value));
	}

	setBool(key: string, value: boolean): void {
		this.set(key, { type: 'boolean', value });
	}

	setText(key: string, value: TextContent): void {
		this.set(key, { type: 'text', value });
	}

	setTimeOnly(key: string, value: TimeOnly): void {
		this.setString(key, value.toString());
	}

	setDateOnly(key: string, value: DateOnly): void {
		this.setString(key, value.toString());
	}

	setDateTime(key: string, value: DateTime): void {
		this.setString(key, value.toString());
	}

	setDuration(key: string, value: Duration): void {
		this.setString(key, value.toString());
	}

	setTable(key: string, value: TableField): void {
		this.set(key, { type: 'table', value });
	}

	/**
	 * Store any JSON value as it is.
	 */
	setJson(key: string, value: unknown): void {
		this.set(key, toFieldValue(value));
	}

	/**
	 * Write `{ data: {...} }`; a missing reference or empty id removes the key.
	 */
	setRelationship(key: string, ref: RelationshipReference | undefined): void {
		const encoded = encodeReference(ref);
		if (encoded) {
			this.set(key, encoded);
		} else {
			this.delete(key);
		}
	}

	setRelationships(key: string, refs: readonly RelationshipReference[]): void {
		const encoded = encodeReferences(refs);
		if (encoded) {
			this.set(key, encoded);
		} else {
			this.delete(key);
		}
	}

	toJSON(): Record<string, JsonValue> {
		return Object.fromEntries(
			Array.from(this.values, ([key, value]): [string, JsonValue] => [key, fromFieldValue(value)])
		);
	}
}
