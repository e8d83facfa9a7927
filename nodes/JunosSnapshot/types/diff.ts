export type FieldStatus = 'match' | 'mismatch';

/** Attached to an entry whose key exists on one side only. */
export type EntryPresence = 'added' | 'deleted';

export type Verdict = 'match' | 'mismatch';

export type KeyPart = string | number;

/** A single key field's value, or the tuple of values of a composite key. */
export type DiffKeyValue = KeyPart | KeyPart[];

/**
 * Status of one aligned entry: a status per compared field, plus a `status`
 * tag (`added` or `deleted`) when the entry exists on one side only.
 */
export type EntryDiff = FieldMap;

/** Status tree handed to report sinks next to the pre and post collections. */
export type DiffNode = FieldStatus | EntryPresence | DiffNode[] | FieldMap;

export type FieldMap = { [field: string]: DiffNode };

export interface DiffSpec<T> {
	/** Field(s) identifying a record across the two snapshots. */
	key: ReadonlyArray<keyof T & string>;
	/** Fields compared between matching records, in report order. */
	fields: ReadonlyArray<keyof T & string>;
	/** Differs for fields whose values are themselves keyed collections. */
	nested?: { [F in keyof T]?: (pre: T[F], post: T[F]) => DiffNode };
}
