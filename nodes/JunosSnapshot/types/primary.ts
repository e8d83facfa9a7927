import type { ParserKind, ParserResultMap } from './records';

export type PrimaryOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Optional first attempt at parsing a segment. Implementations report a
 * failure through the outcome; `parseCommand` also treats a thrown error
 * as a failure and falls back to the built-in parser.
 */
export interface PrimaryParser {
	supports(kind: ParserKind): boolean;
	parse<K extends ParserKind>(kind: K, segment: string): PrimaryOutcome<ParserResultMap[K]>;
}
