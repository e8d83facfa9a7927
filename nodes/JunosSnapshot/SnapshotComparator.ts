import { normalizeTranscript } from '../../utils/transcript';
import { CATALOGUE, type CatalogueEntry } from './catalogue';
import { diffCollections } from './diff/commandDiffs';
import { rollup } from './diff/DiffEngine';
import { parseEntry, type ParseOptions } from './TranscriptParser';
import type { FieldMap, Verdict } from './types/diff';
import type { ParserKind, RecordCollection } from './types/records';

export interface SnapshotReport {
	id: string;
	command: string;
	kind: ParserKind;
	pre: RecordCollection;
	post: RecordCollection;
	comparison: FieldMap;
	verdict: Verdict;
	/** False when the command is absent from the pre transcript. */
	pre_found: boolean;
	post_found: boolean;
}

export interface CompareOptions extends ParseOptions {
	/** Defaults to the whole catalogue. */
	entries?: readonly CatalogueEntry[];
}

/**
 * One report per catalogue entry, in catalogue order. A command missing
 * from either transcript is compared as an empty collection.
 */
export function compareSnapshots(
	preTranscript: string,
	postTranscript: string,
	options: CompareOptions = {},
): SnapshotReport[] {
	const pre = normalizeTranscript(preTranscript);
	const post = normalizeTranscript(postTranscript);

	return (options.entries ?? CATALOGUE).map((entry) => {
		const before = parseEntry(pre, entry, options);
		const after = parseEntry(post, entry, options);
		const comparison = diffCollections(entry.kind, before.records, after.records);
		return {
			id: entry.id,
			command: entry.signature.command,
			kind: entry.kind,
			pre: before.records,
			post: after.records,
			comparison,
			verdict: rollup(comparison),
			pre_found: before.found,
			post_found: after.found,
		};
	});
}

export interface ReportSink {
	accept(report: SnapshotReport): void | Promise<void>;
}

/** Hand reports to a sink one at a time, in order. */
export async function publishReports(reports: readonly SnapshotReport[], sink: ReportSink): Promise<void> {
	for (const report of reports) {
		await sink.accept(report);
	}
}
