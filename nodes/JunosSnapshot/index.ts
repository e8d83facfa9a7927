export { JunosSnapshot } from './JunosSnapshot.node';

export { isPromptLine, findNextPrompt, splitPrompt, type PromptLine } from './segmenter/PromptGrammar';
export {
	buildCommandPattern,
	extractAllSegments,
	extractSegment,
	listCommands,
	resolveMode,
	type CommandSignature,
	type MatchMode,
} from './segmenter/Segmenter';
export { PARSERS, parseSegment, type RecordParser } from './parsers';
export { compareKeys, compareValues, diffRecords, rollup } from './diff/DiffEngine';
export { COMMAND_DIFFS, diffCollections, diffSessions } from './diff/commandDiffs';
export { CATALOGUE, CATALOGUE_VERSION, findCatalogueEntry, type CatalogueEntry } from './catalogue';
export { parseCommand, parseEntry, type ParsedEntry, type ParseOptions } from './TranscriptParser';
export {
	compareSnapshots,
	publishReports,
	type CompareOptions,
	type ReportSink,
	type SnapshotReport,
} from './SnapshotComparator';
export { TemplateManager, defaultStorageDir } from './TemplateManager';
export { TemplatePrimaryParser } from './TemplatePrimaryParser';
export { TemplateValidator } from './TemplateValidator';
export { TextFsmEngine, type EngineOptions } from './TextFsmEngine';
export { LoggingUtils, type SnapshotLogger } from '../../utils/LoggingUtils';
export { normalizeTranscript, readTranscript } from '../../utils/transcript';

export type * from './types/records';
export type * from './types/diff';
export type * from './types/primary';
export type * from './types/template';
