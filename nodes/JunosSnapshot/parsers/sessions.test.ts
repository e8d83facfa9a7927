import { describe, expect, it } from 'vitest';

import { parseP2mpTable, parseSessionList, parseSessionRow, parseSessionTable } from './sessions';

const RSVP_ROW_A = '10.0.0.2        10.0.0.1        Up       0  1 FF       -   299776 lsp-a';
const RSVP_ROW_B = '10.0.0.3        10.0.0.1        Up       0  1 SE       -   299792 lsp-b';

describe('parseSessionRow', () => {
	it('reads the RSVP layout', () => {
		expect(parseSessionRow(RSVP_ROW_A)).toEqual({
			to: '10.0.0.2',
			from: '10.0.0.1',
			state: 'Up',
			rt: 0,
			p: '',
			active_path: '',
			style: '1 FF',
			label_in: '-',
			label_out: '299776',
			lsp_name: 'lsp-a',
		});
	});

	it('reads the ingress LSP layout', () => {
		expect(parseSessionRow('10.0.0.3        10.0.0.1        Up     0 *     primary          lsp-b')).toEqual({
			to: '10.0.0.3',
			from: '10.0.0.1',
			state: 'Up',
			rt: 0,
			p: '*',
			active_path: 'primary',
			style: '',
			label_in: '',
			label_out: '',
			lsp_name: 'lsp-b',
		});
	});

	it('rejects headers and trailers', () => {
		expect(parseSessionRow('To              From            State   Rt Style Labelin Labelout LSPname')).toBeUndefined();
		expect(parseSessionRow('Total 2 displayed, Up 2, Down 0')).toBeUndefined();
	});
});

describe('parseSessionTable', () => {
	it('records section totals from the device lines', () => {
		const output = [
			'Ingress RSVP: 2 sessions',
			'To              From            State   Rt Style Labelin Labelout LSPname',
			RSVP_ROW_A,
			RSVP_ROW_B,
			'Total 2 displayed, Up 2, Down 0',
		].join('\n');

		const table = parseSessionTable(output);
		expect(table.egress).toBeUndefined();
		expect(table.transit).toBeUndefined();
		expect(table.ingress).toMatchObject({
			direction: 'Ingress',
			total_sessions: 2,
			total_displayed: 2,
			total_up: 2,
			total_down: 0,
		});
		expect(table.ingress?.sessions.map((row) => row.lsp_name)).toEqual(['lsp-a', 'lsp-b']);
	});

	it('does not recompute totals from the rows', () => {
		const output = ['Ingress RSVP: 3 sessions', RSVP_ROW_A, RSVP_ROW_B, 'Total 3 displayed, Up 3, Down 0'].join('\n');
		const ingress = parseSessionTable(output).ingress;
		expect(ingress?.total_sessions).toBe(3);
		expect(ingress?.total_displayed).toBe(3);
		expect(ingress?.sessions).toHaveLength(2);
	});

	it('splits output into direction sections', () => {
		const output = [
			'Ingress LSP: 1 sessions',
			'To              From            State Rt P     ActivePath       LSPname',
			'10.0.0.3        10.0.0.1        Up     0 *     primary          lsp-b',
			'Total 1 displayed, Up 1, Down 0',
			'',
			'Egress LSP: 1 sessions',
			'To              From            State   Rt Style Labelin Labelout LSPname',
			'10.0.0.1        10.0.0.3        Up       0  1 FF       3        - lsp-c',
			'Total 1 displayed, Up 1, Down 0',
			'',
			'Transit LSP: 0 sessions',
			'Total 0 displayed, Up 0, Down 0',
		].join('\n');

		const table = parseSessionTable(output);
		expect(table.ingress?.sessions[0]).toMatchObject({ p: '*', active_path: 'primary', lsp_name: 'lsp-b' });
		expect(table.egress?.sessions[0]).toMatchObject({ style: '1 FF', label_in: '3', label_out: '-', lsp_name: 'lsp-c' });
		expect(table.transit).toEqual({
			direction: 'Transit',
			total_sessions: 0,
			total_displayed: 0,
			total_up: 0,
			total_down: 0,
			sessions: [],
		});
	});

	it('flushes a final section that has no trailer', () => {
		const table = parseSessionTable(['Transit RSVP: 1 sessions', RSVP_ROW_A].join('\n'));
		expect(table.transit?.total_displayed).toBe(0);
		expect(table.transit?.sessions).toHaveLength(1);
	});

	it('drops rows seen before any section header', () => {
		expect(parseSessionTable(RSVP_ROW_A)).toEqual({});
	});
});

describe('parseP2mpTable', () => {
	const output = [
		'Ingress LSP: 3 sessions',
		'P2MP name: vpls-1, P2MP branch count: 2',
		'To              From            State Rt P     ActivePath       LSPname',
		'10.0.0.3        10.0.0.1        Up     0 *                      br-1',
		'10.0.0.4        10.0.0.1        Up     0 *                      br-2',
		'P2MP name: vpls-2, P2MP branch count: 1',
		'10.0.0.5        10.0.0.1        Dn     0 *                      br-3',
		'Total 3 displayed, Up 2, Down 1',
	].join('\n');

	it('nests branch rows under their group inside the section', () => {
		const ingress = parseP2mpTable(output).ingress;
		expect(ingress).toMatchObject({ total_sessions: 3, total_displayed: 3, total_up: 2, total_down: 1 });
		expect(ingress?.groups.map((group) => [group.name, group.branch_count, group.sessions.length])).toEqual([
			['vpls-1', 2, 2],
			['vpls-2', 1, 1],
		]);
		expect(ingress?.groups[0].sessions[0]).toMatchObject({ to: '10.0.0.3', p: '*', active_path: '', lsp_name: 'br-1' });
	});

	it('flushes the open group and section at the end of input', () => {
		const truncated = output.split('\n').slice(0, 5).join('\n');
		const groups = parseP2mpTable(truncated).ingress?.groups ?? [];
		expect(groups).toHaveLength(1);
		expect(groups[0].sessions).toHaveLength(2);
	});

	it('drops rows outside a group', () => {
		const text = ['Egress LSP: 1 sessions', '10.0.0.3        10.0.0.1        Up     0 *        br-1'].join('\n');
		expect(parseP2mpTable(text).egress?.groups).toEqual([]);
	});
});

describe('parseSessionList', () => {
	it('collects bare rows from filtered output', () => {
		const list = parseSessionList(
			['10.0.0.2        10.0.0.1        Dn       0  1 FF       -        - lsp-x', 'Total 1 displayed, Up 0, Down 1'].join(
				'\n',
			),
		);
		expect(list.sessions).toHaveLength(1);
		expect(list.sessions[0]).toMatchObject({ state: 'Dn', style: '1 FF', label_out: '-', lsp_name: 'lsp-x' });
	});
});
