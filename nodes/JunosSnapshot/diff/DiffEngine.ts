import { isDeepStrictEqual } from 'node:util';

import type {
	DiffKeyValue,
	DiffNode,
	DiffSpec,
	EntryDiff,
	FieldMap,
	FieldStatus,
	KeyPart,
	Verdict,
} from '../types/diff';

export function compareValues(pre: unknown, post: unknown): FieldStatus {
	return isDeepStrictEqual(pre, post) ? 'match' : 'mismatch';
}

function keyPart(value: unknown): KeyPart {
	return typeof value === 'number' ? value : String(value);
}

function keyOf<T extends object>(record: T, fields: ReadonlyArray<keyof T & string>): DiffKeyValue {
	const parts = fields.map((field) => keyPart(record[field]));
	return parts.length === 1 ? parts[0] : parts;
}

function comparePart(a: KeyPart, b: KeyPart): number {
	if (typeof a === 'number' && typeof b === 'number') return a - b;
	if (typeof a === 'number') return -1;
	if (typeof b === 'number') return 1;
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

/** Numbers numerically, strings by code unit, tuples element by element. */
export function compareKeys(a: DiffKeyValue, b: DiffKeyValue): number {
	const left = Array.isArray(a) ? a : [a];
	const right = Array.isArray(b) ? b : [b];
	const length = Math.min(left.length, right.length);
	for (let i = 0; i < length; i += 1) {
		const order = comparePart(left[i], right[i]);
		if (order !== 0) return order;
	}
	return left.length - right.length;
}

/** Key -> record; a key seen twice keeps the later record. */
function indexByKey<T extends object>(
	records: readonly T[],
	fields: ReadonlyArray<keyof T & string>,
): Map<string, { key: DiffKeyValue; record: T }> {
	const index = new Map<string, { key: DiffKeyValue; record: T }>();
	for (const record of records) {
		const key = keyOf(record, fields);
		index.set(JSON.stringify(key), { key, record });
	}
	return index;
}

function allMismatch<T>(fields: ReadonlyArray<keyof T & string>): FieldMap {
	const map: FieldMap = {};
	for (const field of fields) map[field] = 'mismatch';
	return map;
}

/**
 * Align two record lists by key and report a status per compared field.
 * Entries are returned in key order; a key on one side only has every
 * field marked `mismatch` and a `status` of `added` or `deleted`.
 */
export function diffRecords<T extends object>(
	pre: readonly T[],
	post: readonly T[],
	spec: DiffSpec<T>,
): EntryDiff[] {
	const before = indexByKey(pre, spec.key);
	const after = indexByKey(post, spec.key);
	const keys = new Map<string, DiffKeyValue>();
	for (const [id, { key }] of [...before, ...after]) keys.set(id, key);

	return [...keys.entries()]
		.sort(([, a], [, b]) => compareKeys(a, b))
		.map(([id]): EntryDiff => {
			const left = before.get(id);
			const right = after.get(id);
			if (!left) return { ...allMismatch(spec.fields), status: 'added' };
			if (!right) return { ...allMismatch(spec.fields), status: 'deleted' };

			const fields: FieldMap = {};
			for (const field of spec.fields) {
				const nested = spec.nested?.[field];
				fields[field] = nested
					? nested(left.record[field], right.record[field])
					: compareValues(left.record[field], right.record[field]);
			}
			return fields;
		});
}

/** `mismatch` when any field anywhere in the tree differs or any entry is added or deleted. */
export function rollup(node: DiffNode): Verdict {
	if (typeof node === 'string') return node === 'match' ? 'match' : 'mismatch';
	const children = Array.isArray(node) ? node : Object.values(node);
	return children.some((child) => rollup(child) === 'mismatch') ? 'mismatch' : 'match';
}
