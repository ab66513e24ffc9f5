/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

import { describe, it, expect } from 'vitest';
import { fc, test as fcTest } from '@fast-check/vitest';
import { CustomFields } from './custom-fields';
import { reference } from './relationships';
import { TableField } from './table';
import { DateOnly, DateTime, Duration, TimeOnly } from './temporal';
import { htmlText, plainText } from './value';

describe('CustomFields', () => {
	describe('container', () => {
		it('should build from decoded JSON', () => {
			const fields = CustomFields.fromJSON({ severity: 'major', storyPoints: 3, reviewer: null });

			expect(fields.size).toBe(3);
			expect(fields.keys()).toEqual(['severity', 'storyPoints', 'reviewer']);
		});

		it('should accept missing records', () => {
			expect(CustomFields.fromJSON(undefined).size).toBe(0);
			expect(CustomFields.fromJSON(null).size).toBe(0);
		});

		it('should report null values as present but unreadable', () => {
			const fields = CustomFields.fromJSON({ reviewer: null });

			expect(fields.has('reviewer')).toBe(true);
			expect(fields.getString('reviewer')).toBeUndefined();
			expect(fields.has('missing')).toBe(false);
		});

		it('should delete keys', () => {
			const fields = CustomFields.fromJSON({ severity: 'major' });

			expect(fields.delete('severity')).toBe(true);
			expect(fields.delete('severity')).toBe(false);
			expect(fields.has('severity')).toBe(false);
		});
	});

	describe('scalar getters', () => {
		const fields = CustomFields.fromJSON({
			title: 'Login',
			storyPoints: 3.9,
			negative: -2.7,
			numericString: '5',
			price: '12.50',
			scientific: '1e3',
			padded: ' 1',
			word: 'abc',
			approved: true,
			flagString: 'true'
		});

		it('should read strings only', () => {
			expect(fields.getString('title')).toBe('Login');
			expect(fields.getEnum('title')).toBe('Login');
			expect(fields.getString('storyPoints')).toBeUndefined();
			expect(fields.getString('missing')).toBeUndefined();
		});

		it('should truncate numbers toward zero', () => {
			expect(fields.getInt('storyPoints')).toBe(3);
			expect(fields.getInt('negative')).toBe(-2);
		});

		it('should not read integers from strings', () => {
			expect(fields.getInt('numericString')).toBeUndefined();
			expect(fields.getInt('word')).toBeUndefined();
		});

		it('should read floats from numbers and decimal strings', () => {
			expect(fields.getFloat('storyPoints')).toBe(3.9);
			expect(fields.getFloat('price')).toBe(12.5);
			expect(fields.getFloat('scientific')).toBe(1000);
		});

		it('should reject strings that are not decimal numbers', () => {
			expect(fields.getFloat('word')).toBeUndefined();
			expect(fields.getFloat('padded')).toBeUndefined();
		});

		it('should read booleans only', () => {
			expect(fields.getBool('approved')).toBe(true);
			expect(fields.getBool('flagString')).toBeUndefined();
		});
	});

	describe('getText', () => {
		it('should read the text mapping', () => {
			const fields = CustomFields.fromJSON({ notes: { type: 'text/html', value: '<p>Hi</p>' } });

			expect(fields.getText('notes')).toEqual({ type: 'text/html', value: '<p>Hi</p>' });
		});

		it('should default missing or non-string parts to empty', () => {
			const fields = CustomFields.fromJSON({ notes: { value: 5 } });

			expect(fields.getText('notes')).toEqual({ type: '', value: '' });
		});

		it('should return stored text as-is', () => {
			const fields = new CustomFields();
			const text = htmlText('<b>x</b>');
			fields.setText('notes', text);

			expect(fields.getText('notes')).toBe(text);
		});

		it('should not read strings as text', () => {
			expect(CustomFields.fromJSON({ notes: 'plain' }).getText('notes')).toBeUndefined();
		});
	});

	describe('temporal getters', () => {
		const fields = CustomFields.fromJSON({
			start: '21:12:00',
			badStart: '25:00:00',
			due: '2026-03-01',
			badDue: '2026-02-30',
			at: '2026-01-26T19:23:30Z',
			estimate: '2d 3h',
			numeric: 5
		});

		it('should parse string values', () => {
			expect(fields.getTimeOnly('start')?.toString()).toBe('21:12:00');
			expect(fields.getDateOnly('due')?.toString()).toBe('2026-03-01');
			expect(fields.getDateTime('at')?.toString()).toBe('2026-01-26T19:23:30Z');
			expect(fields.getDuration('estimate')?.totalSeconds).toBe(183600);
		});

		it('should answer undefined when parsing fails', () => {
			expect(fields.getTimeOnly('badStart')).toBeUndefined();
			expect(fields.getDateOnly('badDue')).toBeUndefined();
			expect(fields.getDateTime('due')).toBeUndefined();
			expect(fields.getDuration('numeric')).toBeUndefined();
		});
	});

	describe('getTable', () => {
		it('should read the table mapping', () => {
			const fields = CustomFields.fromJSON({
				steps: {
					keys: ['step', 'expected'],
					rows: [{ values: [plainText('Open page'), plainText('Form shown')] }]
				}
			});

			const table = fields.getTable('steps');

			expect(table?.headers()).toEqual(['step', 'expected']);
			expect(table?.cellByKey(0, 'expected')).toEqual(plainText('Form shown'));
		});

		it('should keep going past malformed rows and cells', () => {
			const fields = CustomFields.fromJSON({
				steps: {
					keys: ['a', 7],
					rows: [{ values: [{ type: 'text/plain', value: 'x' }, 'bad'] }, 'junk']
				}
			});

			const table = fields.getTable('steps');

			expect(table?.keys).toEqual(['a', '']);
			expect(table?.rows).toEqual([
				{ values: [{ type: 'text/plain', value: 'x' }, { type: '', value: '' }] },
				{ values: [] }
			]);
		});

		it('should return stored tables as-is', () => {
			const fields = new CustomFields();
			const table = new TableField(['a']);
			fields.setTable('steps', table);

			expect(fields.getTable('steps')).toBe(table);
		});

		it('should not read lists as tables', () => {
			expect(CustomFields.fromJSON({ steps: [] }).getTable('steps')).toBeUndefined();
		});
	});

	describe('getters never throw', () => {
		fcTest.prop([fc.jsonValue()])('for any decoded JSON', (json) => {
			const fields = CustomFields.fromJSON({ value: json });

			expect(() => {
				fields.getString('value');
				fields.getInt('value');
				fields.getFloat('value');
				fields.getBool('value');
				fields.getText('value');
				fields.getTimeOnly('value');
				fields.getDateOnly('value');
				fields.getDateTime('value');
				fields.getDuration('value');
				fields.getTable('value');
				fields.getRelationship('value');
				fields.getRelationships('value');
			}).not.toThrow();
		});
	});

	describe('typed setters', () => {
		it('should write the wire form', () => {
			const fields = new CustomFields();

			fields.setString('title', 'Login');
			fields.setEnum('severity', 'major');
			fields.setInt('storyPoints', 3.9);
			fields.setFloat('price', 12.5);
			fields.setBool('approved', false);
			fields.setText('notes', plainText('n/a'));
			fields.setTimeOnly('start', TimeOnly.create(9, 0, 0));
			fields.setDateOnly('due', DateOnly.parse('2026-03-01'));
			fields.setDateTime('at', DateTime.parse('2026-01-26T19:23:30Z'));
			fields.setDuration('estimate', Duration.fromSeconds(5400));
			fields.setTable('steps', new TableField(['step'], [{ values: [plainText('Open')] }]));
			fields.setJson('extra', { nested: [1, 2] });

			expect(fields.toJSON()).toEqual({
				title: 'Login',
				severity: 'major',
				storyPoints: 3,
				price: 12.5,
				approved: false,
				notes: { type: 'text/plain', value: 'n/a' },
				start: '09:00:00',
				due: '2026-03-01',
				at: '2026-01-26T19:23:30Z',
				estimate: '1h 30m',
				steps: { keys: ['step'], rows: [{ values: [{ type: 'text/plain', value: 'Open' }] }] },
				extra: { nested: [1, 2] }
			});
		});

		it('should read back what it wrote', () => {
			const fields = new CustomFields();
			fields.setTimeOnly('start', TimeOnly.create(9, 30, 0));
			fields.setDuration('estimate', Duration.parse('1d'));

			expect(fields.getTimeOnly('start')?.toString()).toBe('09:30:00');
			expect(fields.getDuration('estimate')?.totalSeconds).toBe(86400);
		});
	});

	describe('relationships', () => {
		it('should read single and multiple references', () => {
			const fields = CustomFields.fromJSON({
				owner: { data: { type: 'users', id: 'john.doe' } },
				reviewers: {
					data: [
						{ type: 'users', id: 'a' },
						{ type: 'users', id: 'b' }
					]
				}
			});

			expect(fields.getRelationship('owner')).toEqual({ kind: 'user', id: 'john.doe' });
			expect(fields.getRelationship('reviewers')).toEqual({ kind: 'user', id: 'a' });
			expect(fields.getRelationships('reviewers').map((ref) => ref.id)).toEqual(['a', 'b']);
		});

		it('should write the mapping form', () => {
			const fields = new CustomFields();

			fields.setRelationship('owner', reference('user', 'jdoe'));
			fields.setRelationships('reviewers', [reference('user', 'a'), reference('user', 'b')]);

			expect(fields.toJSON()).toEqual({
				owner: { data: { type: 'users', id: 'jdoe' } },
				reviewers: {
					data: [
						{ type: 'users', id: 'a' },
						{ type: 'users', id: 'b' }
					]
				}
			});
		});

		it('should delete the key for absent references', () => {
			const fields = CustomFields.fromJSON({ owner: 'jdoe', reviewers: { data: [] } });

			fields.setRelationship('owner', undefined);
			fields.setRelationships('reviewers', [reference('user', '')]);

			expect(fields.size).toBe(0);
		});
	});
});
