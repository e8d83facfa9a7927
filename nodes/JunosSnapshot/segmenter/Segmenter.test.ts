import { describe, expect, it } from 'vitest';

import { buildCommandPattern, extractAllSegments, extractSegment, listCommands, resolveMode } from './Segmenter';

const TRANSCRIPT = [
	'admin@r1> show arp no-resolve | no-more',
	'MAC Address       Address         Interface                Flags',
	'00:11:22:33:44:01 10.0.0.1        ge-0/0/0.0               none',
	'Total entries: 1',
	'',
	'admin@r1> show rsvp session',
	'Ingress RSVP: 0 sessions',
	'Total 0 displayed, Up 0, Down 0',
	'',
	'admin@r1> show rsvp session | no-more',
	'Ingress RSVP: 1 sessions',
	'10.0.0.2        10.0.0.1        Up       0  1 FF       -   299776 lsp-a',
	'Total 1 displayed, Up 1, Down 0',
	'',
	'admin@r1> show rsvp session | match DN | no-more',
	'',
	'admin@r1> show rsvp session',
	'Egress RSVP: 0 sessions',
	'Total 0 displayed, Up 0, Down 0   ',
	'admin@r1> ',
].join('\n');

describe('resolveMode', () => {
	it('defaults to prefix for piped commands and exact otherwise', () => {
		expect(resolveMode({ command: 'show rsvp session | no-more' })).toBe('prefix');
		expect(resolveMode({ command: 'show rsvp session' })).toBe('exact');
		expect(resolveMode({ command: 'show rsvp session', mode: 'prefix' })).toBe('prefix');
	});
});

describe('buildCommandPattern', () => {
	it('tolerates whitespace and case differences', () => {
		const pattern = buildCommandPattern({ command: 'show arp no-resolve | no-more' });
		expect(pattern.test('admin@r1>   SHOW  arp\tno-resolve|no-more')).toBe(true);
	});

	it('escapes regex metacharacters', () => {
		const pattern = buildCommandPattern({ command: 'show route table inet.0' });
		expect(pattern.test('show route table inetX0')).toBe(false);
	});

	it('does not let a prefix signature run into a longer word', () => {
		const pattern = buildCommandPattern({ command: 'show rsvp session | match DN', mode: 'prefix' });
		expect(pattern.test('show rsvp session | match DNX')).toBe(false);
		pattern.lastIndex = 0;
		expect(pattern.test('show rsvp session | match DN | no-more')).toBe(true);
	});
});

describe('extractSegment', () => {
	it('returns the body between the command line and the next prompt', () => {
		expect(extractSegment(TRANSCRIPT, { command: 'show arp no-resolve | no-more' })).toBe(
			[
				'MAC Address       Address         Interface                Flags',
				'00:11:22:33:44:01 10.0.0.1        ge-0/0/0.0               none',
				'Total entries: 1',
			].join('\n'),
		);
	});

	it('is absent when the command does not occur', () => {
		expect(extractSegment(TRANSCRIPT, { command: 'show bgp summary | no-more' })).toBeUndefined();
		expect(extractSegment('', { command: 'show rsvp session' })).toBeUndefined();
	});

	it('is absent when the command has no output', () => {
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session | match DN | no-more' })).toBeUndefined();
	});

	it('keeps a bare command apart from its piped form', () => {
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session' })).toBe(
			'Ingress RSVP: 0 sessions\nTotal 0 displayed, Up 0, Down 0',
		);
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session | no-more' })).toBe(
			[
				'Ingress RSVP: 1 sessions',
				'10.0.0.2        10.0.0.1        Up       0  1 FF       -   299776 lsp-a',
				'Total 1 displayed, Up 1, Down 0',
			].join('\n'),
		);
	});

	it('selects the nth occurrence and strips trailing whitespace', () => {
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session', occurrence: 2 })).toBe(
			'Egress RSVP: 0 sessions\nTotal 0 displayed, Up 0, Down 0',
		);
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session', occurrence: 3 })).toBeUndefined();
		expect(extractSegment(TRANSCRIPT, { command: 'show rsvp session', occurrence: 0 })).toBeUndefined();
	});

	it('normalises CRLF line endings', () => {
		const crlf = 'admin@r1> show mpls interface\r\nge-0/0/0.0 Up\r\nadmin@r1> \r\n';
		expect(extractSegment(crlf, { command: 'show mpls interface' })).toBe('ge-0/0/0.0 Up');
	});

	it('finds a command on the first line after a byte-order mark', () => {
		const text = '\uFEFFadmin@r1> show mpls interface\nge-0/0/0.0 Up\nadmin@r1> ';
		expect(extractSegment(text, { command: 'show mpls interface' })).toBe('ge-0/0/0.0 Up');
	});

	it('runs to the end of the transcript when no prompt follows', () => {
		const text = 'admin@r1> show mpls interface\nge-0/0/0.0 Up\n\n';
		expect(extractSegment(text, { command: 'show mpls interface' })).toBe('ge-0/0/0.0 Up');
	});

	it('is absent when the transcript ends on the command line', () => {
		expect(extractSegment('admin@r1> show mpls interface', { command: 'show mpls interface' })).toBeUndefined();
	});
});

describe('extractAllSegments', () => {
	it('keeps empty occurrences so numbering follows the transcript', () => {
		const text = 'admin@r1> show lldp neighbors\nadmin@r1> show lldp neighbors\nge-0/0/0 - 00:aa x r2\n';
		expect(extractAllSegments(text, { command: 'show lldp neighbors' })).toEqual([
			undefined,
			'ge-0/0/0 - 00:aa x r2',
		]);
	});
});

describe('listCommands', () => {
	it('reads the first prompt of a capture saved with a byte-order mark', () => {
		expect(listCommands('\uFEFFadmin@r1> show mpls interface\r\nge-0/0/0.0 Up\r\nadmin@r1> show bfd session\r\n')).toEqual([
			'show mpls interface',
			'show bfd session',
		]);
	});

	it('lists typed commands in order and skips bare prompts', () => {
		expect(listCommands(TRANSCRIPT)).toEqual([
			'show arp no-resolve | no-more',
			'show rsvp session',
			'show rsvp session | no-more',
			'show rsvp session | match DN | no-more',
			'show rsvp session',
		]);
	});
});
