/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * JSON:API relationship references.
 *
 * Relationships arrive as `{ "data": { "type", "id", "revision"? } }` or as
 * `{ "data": [ ... ] }`. Some custom fields hold a bare user id instead.
 */

import { member, type FieldValue } from './value';

export const RESOURCE_KINDS = [
	'user',
	'workItem',
	'document',
	'category',
	'plan',
	'collection',
	'comment',
	'attachment',
	'project',
	'linkedWorkItem'
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

const WIRE_TYPES: Record<ResourceKind, string> = {
	user: 'users',
	workItem: 'workitems',
	document: 'documents',
	category: 'categories',
	plan: 'plans',
	collection: 'collections',
	comment: 'workitem_comments',
	attachment: 'workitem_attachments',
	project: 'projects',
	linkedWorkItem: 'linkedworkitems'
};

const KINDS_BY_WIRE_TYPE = new Map(
	RESOURCE_KINDS.map((kind): [string, ResourceKind] => [WIRE_TYPES[kind], kind])
);

/**
 * A typed pointer to another resource.
 *
 * `id` is the bare id for users and `project/local-id` for project-scoped
 * resources such as work items.
 */
export interface RelationshipReference {
	readonly kind: ResourceKind;
	readonly id: string;
	readonly revision?: string;
}

export function wireType(kind: ResourceKind): string {
	return WIRE_TYPES[kind];
}

export function kindOfWireType(type: string): ResourceKind | undefined {
	return KINDS_BY_WIRE_TYPE.get(type);
}

export function reference(kind: ResourceKind, id: string, revision?: string): RelationshipReference {
	return revision === undefined ? { kind, id } : { kind, id, revision };
}

export function projectScopedId(project: string, localId: string): string {
	return `${project}/${localId}`;
}

/**
 * Split `project/local-id`; `undefined` when either half is missing.
 */
export function splitProjectScopedId(id: string): { project: string; localId: string } | undefined {
	const slash = id.indexOf('/');
	if (slash <= 0 || slash === id.length - 1) {
		return undefined;
	}
	return { project: id.slice(0, slash), localId: id.slice(slash + 1) };
}

function decodeResource(value: FieldValue): RelationshipReference | undefined {
	const type = member(value, 'type');
	const id = member(value, 'id');
	if (type?.type !== 'string' || id?.type !== 'string' || id.value === '') {
		return undefined;
	}

	const kind = kindOfWireType(type.value);
	if (!kind) {
		return undefined;
	}

	const revision = member(value, 'revision');
	return reference(kind, id.value, revision?.type === 'string' ? revision.value : undefined);
}

/**
 * Decode one reference. A list gives its first decodable element; a bare
 * non-empty string is read as a user id.
 */
export function decodeReference(value: FieldValue | undefined): RelationshipReference | undefined {
	if (value?.type === 'string') {
		return value.value === '' ? undefined : reference('user', value.value);
	}

	const data = member(value, 'data');
	if (data?.type === 'mapping') {
		return decodeResource(data);
	}
	if (data?.type === 'list') {
		for (const item of data.items) {
			const decoded = decodeResource(item);
			if (decoded) {
				return decoded;
			}
		}
	}
	return undefined;
}

/**
 * Decode every reference in order, skipping malformed elements.
 */
export function decodeReferences(value: FieldValue | undefined): RelationshipReference[] {
	const data = member(value, 'data');
	if (data?.type === 'mapping') {
		const decoded = decodeResource(data);
		return decoded ? [decoded] : [];
	}
	if (data?.type !== 'list') {
		return [];
	}

	const references: RelationshipReference[] = [];
	for (const item of data.items) {
		const decoded = decodeResource(item);
		if (decoded) {
			references.push(decoded);
		}
	}
	return references;
}

function encodeResource(ref: RelationshipReference): FieldValue {
	const entries = new Map<string, FieldValue>([
		['type', { type: 'string', value: wireType(ref.kind) }],
		['id', { type: 'string', value: ref.id }]
	]);
	if (ref.revision !== undefined) {
		entries.set('revision', { type: 'string', value: ref.revision });
	}
	return { type: 'mapping', entries };
}

function envelope(data: FieldValue): FieldValue {
	return { type: 'mapping', entries: new Map([['data', data]]) };
}

/**
 * Encode `{ data: { type, id, revision? } }`; `undefined` when there is
 * nothing to reference.
 */
export function encodeReference(ref: RelationshipReference | undefined): FieldValue | undefined {
	if (!ref || ref.id === '') {
		return undefined;
	}
	return envelope(encodeResource(ref));
}

/**
 * Encode `{ data: [...] }` without the empty ids; `undefined` when none are left.
 */
export function encodeReferences(refs: readonly RelationshipReference[]): FieldValue | undefined {
	const items = refs.filter((ref) => ref.id !== '').map(encodeResource);
	if (items.length === 0) {
		return undefined;
	}
	return envelope({ type: 'list', items });
}
