/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

import { describe, it, expect } from 'vitest';
import { fc, test as fcTest } from '@fast-check/vitest';
import {
	RESOURCE_KINDS,
	decodeReference,
	decodeReferences,
	encodeReference,
	encodeReferences,
	kindOfWireType,
	projectScopedId,
	reference,
	splitProjectScopedId,
	wireType
} from './relationships';
import { fromFieldValue, toFieldValue } from './value';

describe('decodeReference', () => {
	it('should decode a single object', () => {
		const value = toFieldValue({ data: { type: 'users', id: 'john.doe' } });

		expect(decodeReference(value)).toEqual({ kind: 'user', id: 'john.doe' });
	});

	it('should take the first element of a list', () => {
		const value = toFieldValue({
			data: [
				{ type: 'users', id: 'a' },
				{ type: 'users', id: 'b' }
			]
		});

		expect(decodeReference(value)).toEqual({ kind: 'user', id: 'a' });
	});

	it('should skip malformed elements before the first good one', () => {
		const value = toFieldValue({ data: [{ type: 'users' }, 'junk', { type: 'workitems', id: 'demo/WI-2' }] });

		expect(decodeReference(value)).toEqual({ kind: 'workItem', id: 'demo/WI-2' });
	});

	it('should keep the revision', () => {
		const value = toFieldValue({ data: { type: 'documents', id: 'demo/Specs/Login', revision: '1234' } });

		expect(decodeReference(value)).toEqual({ kind: 'document', id: 'demo/Specs/Login', revision: '1234' });
	});

	it('should read a bare string as a user id', () => {
		expect(decodeReference(toFieldValue('jdoe'))).toEqual({ kind: 'user', id: 'jdoe' });
		expect(decodeReference(toFieldValue(''))).toBeUndefined();
	});

	it('should treat empty ids, unknown types and other shapes as absent', () => {
		expect(decodeReference(toFieldValue({ data: { type: 'users', id: '' } }))).toBeUndefined();
		expect(decodeReference(toFieldValue({ data: { type: 'widgets', id: 'x' } }))).toBeUndefined();
		expect(decodeReference(toFieldValue({ data: { type: 'users', id: 7 } }))).toBeUndefined();
		expect(decodeReference(toFieldValue({ type: 'users', id: 'x' }))).toBeUndefined();
		expect(decodeReference(toFieldValue(null))).toBeUndefined();
		expect(decodeReference(undefined)).toBeUndefined();
	});
});

describe('decodeReferences', () => {
	it('should decode every element in order', () => {
		const value = toFieldValue({
			data: [
				{ type: 'users', id: 'a' },
				{ type: 'users', id: '' },
				{ type: 'users', id: 'b' }
			]
		});

		expect(decodeReferences(value)).toEqual([
			{ kind: 'user', id: 'a' },
			{ kind: 'user', id: 'b' }
		]);
	});

	it('should wrap a single object', () => {
		const value = toFieldValue({ data: { type: 'categories', id: 'demo/ui' } });

		expect(decodeReferences(value)).toEqual([{ kind: 'category', id: 'demo/ui' }]);
	});

	it('should not accept bare strings', () => {
		expect(decodeReferences(toFieldValue('jdoe'))).toEqual([]);
		expect(decodeReferences(undefined)).toEqual([]);
	});
});

describe('encodeReference', () => {
	it('should write the envelope with the wire type', () => {
		const encoded = encodeReference(reference('workItem', 'demo/WI-1', '42'));

		expect(encoded && fromFieldValue(encoded)).toEqual({
			data: { type: 'workitems', id: 'demo/WI-1', revision: '42' }
		});
	});

	it('should encode nothing for absent references', () => {
		expect(encodeReference(undefined)).toBeUndefined();
		expect(encodeReference(reference('user', ''))).toBeUndefined();
	});

	it('should write the list form without empty ids', () => {
		const encoded = encodeReferences([reference('user', 'a'), reference('user', ''), reference('user', 'b')]);

		expect(encoded && fromFieldValue(encoded)).toEqual({
			data: [
				{ type: 'users', id: 'a' },
				{ type: 'users', id: 'b' }
			]
		});
		expect(encodeReferences([reference('user', '')])).toBeUndefined();
	});
});

describe('reference round-trip', () => {
	fcTest.prop([
		fc.constantFrom(...RESOURCE_KINDS),
		fc.string({ minLength: 1 }),
		fc.option(fc.string(), { nil: undefined })
	])('decoding an encoded reference should give it back', (kind, id, revision) => {
		const ref = reference(kind, id, revision);

		expect(decodeReference(encodeReference(ref))).toEqual(ref);
		expect(decodeReferences(encodeReferences([ref]))).toEqual([ref]);
	});
});

describe('wire types', () => {
	it('should map kinds both ways', () => {
		expect(wireType('comment')).toBe('workitem_comments');
		expect(kindOfWireType('linkedworkitems')).toBe('linkedWorkItem');
		expect(kindOfWireType('workitem')).toBeUndefined();
	});
});

describe('project scoped ids', () => {
	it('should join and split', () => {
		expect(projectScopedId('demo', 'WI-1')).toBe('demo/WI-1');
		expect(splitProjectScopedId('demo/WI-1')).toEqual({ project: 'demo', localId: 'WI-1' });
		expect(splitProjectScopedId('demo/Specs/Login')).toEqual({ project: 'demo', localId: 'Specs/Login' });
	});

	it('should reject ids without both halves', () => {
		expect(splitProjectScopedId('WI-1')).toBeUndefined();
		expect(splitProjectScopedId('/WI-1')).toBeUndefined();
		expect(splitProjectScopedId('demo/')).toBeUndefined();
	});
});
