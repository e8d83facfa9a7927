import type { TemplateManager } from './TemplateManager';
import { TextFsmEngine } from './TextFsmEngine';
import type { PrimaryOutcome, PrimaryParser } from './types/primary';
import type { ArpEntry, MplsInterface, ParserKind, ParserResultMap } from './types/records';
import type { ParsedRecord, Template } from './types/template';

type Converter<K extends ParserKind> = (records: ParsedRecord[]) => PrimaryOutcome<ParserResultMap[K]>;

function text(record: ParsedRecord, field: string): string | undefined {
	const value = record[field];
	return typeof value === 'string' ? value : undefined;
}

function convertArp(records: ParsedRecord[]): PrimaryOutcome<ParserResultMap['arp']> {
	const entries: ArpEntry[] = [];
	let totalEntries = 0;
	for (const record of records) {
		if (typeof record.total_entries === 'number') {
			totalEntries = record.total_entries;
			continue;
		}
		const mac = text(record, 'mac_address');
		const ip = text(record, 'ip_address');
		const iface = text(record, 'interface');
		const flags = text(record, 'flags');
		if (mac === undefined || ip === undefined || iface === undefined || flags === undefined) {
			return { ok: false, reason: `Incomplete ARP record: ${JSON.stringify(record)}` };
		}
		entries.push({ mac_address: mac, ip_address: ip, interface: iface, flags });
	}
	return { ok: true, value: { total_entries: totalEntries === 0 ? entries.length : totalEntries, entries } };
}

function convertMplsInterface(records: ParsedRecord[]): PrimaryOutcome<ParserResultMap['mplsInterface']> {
	const interfaces: MplsInterface[] = [];
	for (const record of records) {
		const iface = text(record, 'interface');
		const state = text(record, 'state');
		if (iface === undefined || state === undefined) {
			return { ok: false, reason: `Incomplete MPLS interface record: ${JSON.stringify(record)}` };
		}
		interfaces.push({
			interface: iface,
			state,
			administrative_groups: (text(record, 'administrative_groups') ?? '').split(/\s+/).filter(Boolean).join(' '),
		});
	}
	return { ok: true, value: { interfaces } };
}

const CONVERTERS: { readonly [K in ParserKind]?: Converter<K> } = {
	arp: convertArp,
	mplsInterface: convertMplsInterface,
};

/**
 * {@link PrimaryParser} backed by stored templates, one per parser kind,
 * with a converter from the engine's flat records to the typed collection.
 */
export class TemplatePrimaryParser implements PrimaryParser {
	private engine = new TextFsmEngine();
	private templates: ReadonlyMap<ParserKind, Template>;

	constructor(templates: ReadonlyMap<ParserKind, Template>) {
		this.templates = templates;
	}

	static async load(manager: TemplateManager): Promise<TemplatePrimaryParser> {
		return new TemplatePrimaryParser(await manager.byParser());
	}

	supports(kind: ParserKind): boolean {
		return this.templates.has(kind) && CONVERTERS[kind] !== undefined;
	}

	parse<K extends ParserKind>(kind: K, segment: string): PrimaryOutcome<ParserResultMap[K]> {
		const template = this.templates.get(kind);
		const convert: Converter<K> | undefined = CONVERTERS[kind];
		if (!template || !convert) return { ok: false, reason: `No template for ${kind}` };

		const result = this.engine.parseSegment(segment, template, { resetOnEmit: true, coerceTypes: true });
		if (result.meta.errors) return { ok: false, reason: result.meta.errors.join('; ') };
		if (result.records.length === 0) {
			return { ok: false, reason: `Template ${template.id} matched no records` };
		}
		return convert(result.records);
	}
}
