/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

import { TableAccessError } from './errors';
import type { TextContent } from './value';

export interface TableRow {
	values: TextContent[];
}

/**
 * Wire form of a table field.
 */
export type TableJson = {
	keys: string[];
	rows: { values: { type: string; value: string }[] }[];
};

/**
 * A table custom field: column keys plus rows of rich-text cells.
 *
 * @example
 * ```typescript
 * const table = new TableField(['name', 'role']);
 * table.addRow([plainText('Ada'), plainText('Reviewer')]);
 * table.rowAsMap(0).get('role'); // { type: 'text/plain', value: 'Reviewer' }
 * ```
 */
export class TableField {
	readonly keys: string[];
	readonly rows: TableRow[];

	constructor(keys: string[] = [], rows: TableRow[] = []) {
		this.keys = keys;
		this.rows = rows;
	}

	get rowCount(): number {
		return this.rows.length;
	}

	get columnCount(): number {
		return this.keys.length;
	}

	headers(): string[] {
		return [...this.keys];
	}

	private checkRow(row: number): TableRow {
		const found = Number.isInteger(row) && row >= 0 ? this.rows[row] : undefined;
		if (!found) {
			throw new TableAccessError(`row index ${row} out of bounds (table has ${this.rows.length} rows)`);
		}
		return found;
	}

	private columnIndex(key: string): number {
		const index = this.keys.indexOf(key);
		if (index === -1) {
			throw new TableAccessError(`column key "${key}" not found in table`);
		}
		return index;
	}

	cell(row: number, col: number): TextContent {
		const values = this.checkRow(row).values;
		const found = Number.isInteger(col) && col >= 0 ? values[col] : undefined;
		if (!found) {
			throw new TableAccessError(
				`column index ${col} out of bounds (row ${row} has ${values.length} columns)`
			);
		}
		return found;
	}

	cellByKey(row: number, key: string): TextContent {
		this.checkRow(row);
		return this.cell(row, this.columnIndex(key));
	}

	row(row: number): TextContent[] {
		return this.checkRow(row).values;
	}

	/**
	 * Cells of a row keyed by column. Columns the row has no cell for are left out.
	 */
	rowAsMap(row: number): Map<string, TextContent> {
		const values = this.checkRow(row).values;
		const result = new Map<string, TextContent>();
		this.keys.forEach((key, i) => {
			const value = values[i];
			if (value) {
				result.set(key, value);
			}
		});
		return result;
	}

	rowsAsMaps(): Map<string, TextContent>[] {
		return this.rows.map((_, i) => this.rowAsMap(i));
	}

	/**
	 * Cells of a column; rows too short for it give an empty cell.
	 */
	column(col: number): TextContent[] {
		if (!Number.isInteger(col) || col < 0 || col >= this.keys.length) {
			throw new TableAccessError(`column index ${col} out of bounds (table has ${this.keys.length} columns)`);
		}
		return this.rows.map((row) => row.values[col] ?? { type: '', value: '' });
	}

	columnByKey(key: string): TextContent[] {
		return this.column(this.columnIndex(key));
	}

	addRow(values: TextContent[]): void {
		if (values.length !== this.keys.length) {
			throw new TableAccessError(
				`row has ${values.length} values but table has ${this.keys.length} columns`
			);
		}
		this.rows.push({ values });
	}

	setCell(row: number, col: number, value: TextContent): void {
		this.cell(row, col);
		this.checkRow(row).values[col] = value;
	}

	toJSON(): TableJson {
		return {
			keys: [...this.keys],
			rows: this.rows.map((row) => ({
				values: row.values.map((cell) => ({ type: cell.type, value: cell.value }))
			}))
		};
	}
}
