import { describe, expect, it, vi } from 'vitest';

import { CATALOGUE } from './catalogue';
import { parseSegment } from './parsers';
import { parseCommand, parseEntry } from './TranscriptParser';
import type { PrimaryOutcome, PrimaryParser } from './types/primary';
import type { ParserKind, ParserResultMap } from './types/records';

const OUTPUT = [
	'MAC Address       Address         Interface                Flags',
	'00:11:22:33:44:01 10.0.0.1        ge-0/0/0.0               none',
	'Total entries: 1',
].join('\n');

const PRIMARY_OUTPUT = '00:11:22:33:44:99 10.9.9.9 ge-0/0/9.0 none\nTotal entries: 1';

type Behaviour = 'ok' | 'fail' | 'throw';

function fakePrimary(behaviour: Behaviour): PrimaryParser {
	return {
		supports: (kind) => kind === 'arp',
		parse<K extends ParserKind>(kind: K, _segment: string): PrimaryOutcome<ParserResultMap[K]> {
			if (behaviour === 'throw') throw new Error('template exploded');
			if (behaviour === 'fail') return { ok: false, reason: 'Template t1 matched no records' };
			return { ok: true, value: parseSegment(kind, PRIMARY_OUTPUT) };
		},
	};
}

const testLogger = () => ({ debug: vi.fn(), warn: vi.fn() });

describe('parseCommand', () => {
	it('uses the built-in parser when no primary is configured', () => {
		expect(parseCommand('arp', OUTPUT).entries[0].ip_address).toBe('10.0.0.1');
	});

	it('returns the primary result when it succeeds', () => {
		const logger = testLogger();
		const table = parseCommand('arp', OUTPUT, { primary: fakePrimary('ok'), logger });

		expect(table.entries).toEqual([
			{ mac_address: '00:11:22:33:44:99', ip_address: '10.9.9.9', interface: 'ge-0/0/9.0', flags: 'none' },
		]);
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it('falls back when the primary reports a failure', () => {
		const logger = testLogger();
		const table = parseCommand('arp', OUTPUT, { primary: fakePrimary('fail'), logger });

		expect(table).toEqual(parseSegment('arp', OUTPUT));
		expect(logger.warn).toHaveBeenCalledWith(
			'Primary parser failed for arp, using built-in parser: Template t1 matched no records',
		);
	});

	it('falls back when the primary throws', () => {
		const logger = testLogger();
		const table = parseCommand('arp', OUTPUT, { primary: fakePrimary('throw'), logger });

		expect(table).toEqual(parseSegment('arp', OUTPUT));
		expect(logger.warn).toHaveBeenCalledWith('Primary parser threw for arp, using built-in parser: template exploded');
	});

	it('skips the primary for absent or blank segments', () => {
		const primary = fakePrimary('throw');
		const parse = vi.spyOn(primary, 'parse');
		const logger = testLogger();

		expect(parseCommand('arp', undefined, { primary, logger })).toEqual({ total_entries: 0, entries: [] });
		expect(parseCommand('arp', '  \n ', { primary, logger })).toEqual({ total_entries: 0, entries: [] });
		expect(parse).not.toHaveBeenCalled();
		expect(logger.debug).toHaveBeenCalledWith('Parsing arp: absent');
	});

	it('skips the primary for kinds it does not support', () => {
		const primary = fakePrimary('throw');
		const parse = vi.spyOn(primary, 'parse');

		expect(parseCommand('vrrp', 'ge-0/0/0.0 up 1 master Active lcl 10.0.0.2', { primary }).entries).toHaveLength(1);
		expect(parse).not.toHaveBeenCalled();
	});
});

describe('parseEntry', () => {
	const entry = CATALOGUE[0];

	it('reports a located command with its segment', () => {
		const transcript = `admin@r1> show arp no-resolve | no-more\n${OUTPUT}\n\nadmin@r1> \n`;
		const parsed = parseEntry(transcript, entry);

		expect(parsed).toMatchObject({
			id: 'show_arp_no_resolve',
			command: 'show arp no-resolve | no-more',
			kind: 'arp',
			found: true,
			segment: OUTPUT,
		});
		expect(parsed.records).toEqual(parseSegment('arp', OUTPUT));
	});

	it('reports a missing command as not found with empty records', () => {
		const parsed = parseEntry('admin@r1> show version\nJunos: 21.4R3\n', entry);

		expect(parsed.found).toBe(false);
		expect(parsed.segment).toBeUndefined();
		expect(parsed.records).toEqual({ total_entries: 0, entries: [] });
	});
});
