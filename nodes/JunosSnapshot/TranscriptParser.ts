import { LoggingUtils, type SnapshotLogger } from '../../utils/LoggingUtils';
import type { CatalogueEntry } from './catalogue';
import { parseSegment } from './parsers';
import { extractSegment } from './segmenter/Segmenter';
import type { PrimaryParser } from './types/primary';
import type { ParserKind, ParserResultMap, RawSegment, RecordCollection } from './types/records';

export interface ParseOptions {
	/** Consulted before the built-in parser for the kinds it supports. */
	primary?: PrimaryParser;
	logger?: SnapshotLogger;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Parse one segment into its typed collection. A configured primary parser
 * gets the first attempt; when it fails or throws, the failure is logged and
 * the built-in parser runs on the same segment from scratch.
 */
export function parseCommand<K extends ParserKind>(
	kind: K,
	segment: RawSegment,
	options: ParseOptions = {},
): ParserResultMap[K] {
	const logger = options.logger ?? LoggingUtils.console(false);
	const primary = options.primary;
	logger.debug(`Parsing ${kind}: ${LoggingUtils.describeSegment(segment)}`);

	if (segment !== undefined && segment.trim() !== '' && primary && primary.supports(kind)) {
		try {
			const outcome = primary.parse(kind, segment);
			if (outcome.ok) return outcome.value;
			logger.warn(`Primary parser failed for ${kind}, using built-in parser: ${outcome.reason}`);
		} catch (error) {
			logger.warn(`Primary parser threw for ${kind}, using built-in parser: ${errorMessage(error)}`);
		}
	}

	return parseSegment(kind, segment);
}

export interface ParsedEntry {
	id: string;
	command: string;
	kind: ParserKind;
	found: boolean;
	segment: RawSegment;
	records: RecordCollection;
}

/** Locate a catalogue command in a transcript and parse its output. */
export function parseEntry(transcript: string, entry: CatalogueEntry, options: ParseOptions = {}): ParsedEntry {
	const segment = extractSegment(transcript, entry.signature);
	return {
		id: entry.id,
		command: entry.signature.command,
		kind: entry.kind,
		found: segment !== undefined,
		segment,
		records: parseCommand(entry.kind, segment, options),
	};
}
