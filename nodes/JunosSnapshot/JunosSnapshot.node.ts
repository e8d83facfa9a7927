import type {
	IDataObject,
	IExecuteFunctions,
	INodeExecutionData,
	INodeProperties,
	INodeType,
	INodeTypeDescription,
} from 'n8n-workflow';
import { NodeOperationError } from 'n8n-workflow';

import type { SnapshotLogger } from '../../utils/LoggingUtils';
import { normalizeTranscript, readTranscript } from '../../utils/transcript';
import { CATALOGUE, CATALOGUE_VERSION, findCatalogueEntry, type CatalogueEntry } from './catalogue';
import { extractSegment, listCommands } from './segmenter/Segmenter';
import { compareSnapshots, publishReports, type ReportSink, type SnapshotReport } from './SnapshotComparator';
import { TemplateManager } from './TemplateManager';
import { TemplatePrimaryParser } from './TemplatePrimaryParser';
import { parseEntry, type ParseOptions } from './TranscriptParser';

type TextSide = 'text' | 'pre' | 'post';

function transcriptProperties(side: TextSide, label: string, operations: string[]): INodeProperties[] {
	return [
		{
			displayName: `${label} Source`,
			name: `${side}Source`,
			type: 'options',
			displayOptions: { show: { operation: operations } },
			options: [
				{ name: 'Input Field', value: 'field' },
				{ name: 'String', value: 'string' },
				{ name: 'File', value: 'file' },
			],
			default: 'field',
		},
		{
			displayName: `${label} Field Name`,
			name: `${side}Field`,
			type: 'string',
			displayOptions: { show: { operation: operations, [`${side}Source`]: ['field'] } },
			default: side === 'text' ? 'data' : side,
			description: 'Name of the input field containing the transcript',
		},
		{
			displayName: `${label} Text`,
			name: `${side}Value`,
			type: 'string',
			typeOptions: { rows: 5 },
			displayOptions: { show: { operation: operations, [`${side}Source`]: ['string'] } },
			default: '',
		},
		{
			displayName: `${label} File Path`,
			name: `${side}File`,
			type: 'string',
			displayOptions: { show: { operation: operations, [`${side}Source`]: ['file'] } },
			default: '',
			placeholder: '/data/captures/router1-pre.txt',
		},
	];
}

function commandLabel(entry: CatalogueEntry): string {
	const { command, occurrence } = entry.signature;
	return occurrence && occurrence > 1 ? `${command} (occurrence ${occurrence})` : command;
}

function toDataObject(value: object): IDataObject {
	const data: IDataObject = JSON.parse(JSON.stringify(value));
	return data;
}

/** Turns each report into one output item. */
class ExecutionDataSink implements ReportSink {
	readonly items: INodeExecutionData[] = [];
	private itemIndex: number;

	constructor(itemIndex: number) {
		this.itemIndex = itemIndex;
	}

	accept(report: SnapshotReport): void {
		this.items.push({ json: toDataObject(report), pairedItem: { item: this.itemIndex } });
	}
}

export class JunosSnapshot implements INodeType {
	description: INodeTypeDescription = {
		displayName: 'Junos Snapshot',
		name: 'junosSnapshot',
		icon: 'fa:code-compare',
		group: ['transform'],
		version: 1,
		subtitle: '={{$parameter["operation"]}}',
		description: 'Parse Junos CLI transcripts and compare pre/post snapshots',
		defaults: { name: 'Junos Snapshot' },
		inputs: ['main'],
		outputs: ['main'],
		properties: [
			{
				displayName: 'Operation',
				name: 'operation',
				type: 'options',
				noDataExpression: true,
				options: [
					{
						name: 'Compare Snapshots',
						value: 'compareSnapshots',
						description: 'Compare a pre and a post transcript, one item per command',
						action: 'Compare snapshots',
					},
					{
						name: 'Extract Segment',
						value: 'extractSegment',
						description: 'Cut the output of catalogue commands out of a transcript',
						action: 'Extract segment',
					},
					{
						name: 'List Commands',
						value: 'listCommands',
						description: 'List the commands typed in a transcript',
						action: 'List commands',
					},
					{
						name: 'Parse Command',
						value: 'parseCommand',
						description: 'Parse the output of catalogue commands into records',
						action: 'Parse command',
					},
				],
				default: 'compareSnapshots',
			},
			...transcriptProperties('text', 'Transcript', ['listCommands', 'extractSegment', 'parseCommand']),
			...transcriptProperties('pre', 'Pre', ['compareSnapshots']),
			...transcriptProperties('post', 'Post', ['compareSnapshots']),
			{
				displayName: 'Commands',
				name: 'commandIds',
				type: 'multiOptions',
				displayOptions: { show: { operation: ['extractSegment', 'parseCommand', 'compareSnapshots'] } },
				options: CATALOGUE.map((entry) => ({ name: commandLabel(entry), value: entry.id })),
				default: [],
				description: 'Commands to process. Leave empty for the whole catalogue.',
			},
			{
				displayName: 'Options',
				name: 'options',
				type: 'collection',
				placeholder: 'Add option',
				displayOptions: { show: { operation: ['extractSegment', 'parseCommand', 'compareSnapshots'] } },
				default: {},
				options: [
					{
						displayName: 'Template Folder',
						name: 'templateFolder',
						type: 'string',
						default: '',
						description: 'Where parsing templates are stored. Defaults to ~/.n8n/junos-snapshot.',
					},
					{
						displayName: 'Use Template Parser',
						name: 'useTemplateParser',
						type: 'boolean',
						default: false,
						description:
							'Whether to try the stored templates first. Commands without a template, or whose template fails, use the built-in parser.',
					},
					{
						displayName: 'Verbose Logging',
						name: 'verboseLogging',
						type: 'boolean',
						default: false,
					},
				],
			},
		],
	};

	async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
		const items = this.getInputData();
		const operation = this.getNodeParameter('operation', 0) as string;
		const returnItems: INodeExecutionData[] = [];

		const options = this.getNodeParameter('options', 0, {}) as IDataObject;
		const verboseLogging = options.verboseLogging === true;
		const logger: SnapshotLogger = {
			debug: (message) => {
				if (verboseLogging) this.logger.debug(message);
			},
			warn: (message) => this.logger.warn(message),
		};
		const parseOptions: ParseOptions = { logger };
		if (options.useTemplateParser === true && operation !== 'listCommands') {
			const folder = typeof options.templateFolder === 'string' ? options.templateFolder : '';
			parseOptions.primary = await TemplatePrimaryParser.load(new TemplateManager(folder || undefined, logger));
		}

		for (let i = 0; i < items.length; i++) {
			try {
				if (operation === 'listCommands') {
					const transcript = await JunosSnapshot.readSide(this, i, 'text');
					returnItems.push({
						json: { catalogueVersion: CATALOGUE_VERSION, commands: listCommands(transcript) },
						pairedItem: { item: i },
					});
				} else if (operation === 'extractSegment') {
					const transcript = await JunosSnapshot.readSide(this, i, 'text');
					for (const entry of JunosSnapshot.selectedEntries(this, i)) {
						const segment = extractSegment(transcript, entry.signature);
						returnItems.push({
							json: {
								id: entry.id,
								command: entry.signature.command,
								found: segment !== undefined,
								segment: segment ?? null,
							},
							pairedItem: { item: i },
						});
					}
				} else if (operation === 'parseCommand') {
					const transcript = await JunosSnapshot.readSide(this, i, 'text');
					for (const entry of JunosSnapshot.selectedEntries(this, i)) {
						const parsed = parseEntry(transcript, entry, parseOptions);
						returnItems.push({
							json: toDataObject({
								id: parsed.id,
								command: parsed.command,
								kind: parsed.kind,
								found: parsed.found,
								records: parsed.records,
							}),
							pairedItem: { item: i },
						});
					}
				} else if (operation === 'compareSnapshots') {
					const pre = await JunosSnapshot.readSide(this, i, 'pre');
					const post = await JunosSnapshot.readSide(this, i, 'post');
					const reports = compareSnapshots(pre, post, {
						...parseOptions,
						entries: JunosSnapshot.selectedEntries(this, i),
					});
					const sink = new ExecutionDataSink(i);
					await publishReports(reports, sink);
					returnItems.push(...sink.items);
				} else {
					throw new NodeOperationError(this.getNode(), `Unsupported operation: ${operation}`, {
						itemIndex: i,
					});
				}
			} catch (error) {
				const errorMessage = error instanceof Error ? error.message : String(error);
				if (this.continueOnFail()) {
					this.logger.warn(`Item ${i} failed: ${errorMessage}`);
					returnItems.push({
						json: { error: errorMessage, itemIndex: i, operation },
						pairedItem: { item: i },
					});
					continue;
				}
				if (error instanceof NodeOperationError) throw error;
				throw new NodeOperationError(this.getNode(), `Operation failed for item ${i}: ${errorMessage}`, {
					itemIndex: i,
					description: `Operation: ${operation}`,
				});
			}
		}

		return [returnItems];
	}

	private static selectedEntries(executeFunctions: IExecuteFunctions, itemIndex: number): CatalogueEntry[] {
		const ids = executeFunctions.getNodeParameter('commandIds', itemIndex, []) as string[];
		if (ids.length === 0) return [...CATALOGUE];
		return ids.map((id) => {
			const entry = findCatalogueEntry(id);
			if (!entry) {
				throw new NodeOperationError(executeFunctions.getNode(), `Unknown command id: ${id}`, { itemIndex });
			}
			return entry;
		});
	}

	private static async readSide(
		executeFunctions: IExecuteFunctions,
		itemIndex: number,
		side: TextSide,
	): Promise<string> {
		const source = executeFunctions.getNodeParameter(`${side}Source`, itemIndex) as string;

		if (source === 'string') {
			return normalizeTranscript(executeFunctions.getNodeParameter(`${side}Value`, itemIndex, '') as string);
		}

		if (source === 'file') {
			const file = executeFunctions.getNodeParameter(`${side}File`, itemIndex, '') as string;
			if (!file.trim()) {
				throw new NodeOperationError(executeFunctions.getNode(), `No ${side} file path given`, { itemIndex });
			}
			try {
				return await readTranscript(file);
			} catch (error) {
				const reason = error instanceof Error ? error.message : String(error);
				throw new NodeOperationError(executeFunctions.getNode(), `Cannot read transcript ${file}: ${reason}`, {
					itemIndex,
				});
			}
		}

		const fieldName = executeFunctions.getNodeParameter(`${side}Field`, itemIndex, side) as string;
		const value = executeFunctions.getInputData()[itemIndex].json[fieldName];
		if (typeof value !== 'string') {
			throw new NodeOperationError(
				executeFunctions.getNode(),
				`Input field "${fieldName}" does not contain a transcript`,
				{ itemIndex },
			);
		}
		return normalizeTranscript(value);
	}
}
