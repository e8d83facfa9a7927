import { describe, expect, it } from 'vitest';

import type { RsvpNeighbors, SessionRow, SessionSection, VrrpSummary } from '../types/records';
import { rollup } from './DiffEngine';
import { COMMAND_DIFFS, diffCollections } from './commandDiffs';

function row(to: string, lsp: string, state = 'Up'): SessionRow {
	return {
		to,
		from: '10.255.0.1',
		state,
		rt: 0,
		p: '',
		active_path: '',
		style: 'FF',
		label_in: '-',
		label_out: '3',
		lsp_name: lsp,
	};
}

describe('diffCollections', () => {
	it('flags a changed VRRP address list as one field', () => {
		const entry = {
			interface: 'ge-0/0/0.0',
			state: 'up',
			group: 1,
			vr_state: 'master',
			vr_mode: 'Active',
			addresses: [{ type: 'lcl', address: '10.0.0.2' }],
		};
		const pre: VrrpSummary = { entries: [entry] };
		const post: VrrpSummary = {
			entries: [{ ...entry, addresses: [...entry.addresses, { type: 'vip', address: '10.0.0.1' }] }],
		};

		expect(diffCollections('vrrp', pre, post)).toEqual({
			entries: [
				{
					interface: 'match',
					state: 'match',
					group: 'match',
					vr_state: 'match',
					vr_mode: 'match',
					addresses: 'mismatch',
				},
			],
		});
	});

	it('ignores counters that move between captures', () => {
		const neighbor = {
			address: '10.0.0.2',
			idle: 0,
			up_down: '1/0',
			last_change: '2w1d 3:04:05',
			hello_interval: 9,
			hello_tx_rx: '1000/1000',
			messages_received: 500,
		};
		const pre: RsvpNeighbors = { total_neighbors: 1, neighbors: [neighbor] };
		const post: RsvpNeighbors = {
			total_neighbors: 1,
			neighbors: [{ ...neighbor, idle: 5, last_change: '2w1d 3:10:00', hello_tx_rx: '1040/1040', messages_received: 540 }],
		};

		expect(rollup(diffCollections('rsvpNeighbor', pre, post))).toBe('match');
	});

	it('compares a missing session section as an empty one', () => {
		const ingress: SessionSection = {
			direction: 'Ingress',
			total_sessions: 1,
			total_displayed: 1,
			total_up: 1,
			total_down: 0,
			sessions: [row('10.255.0.2', 'lsp-a')],
		};

		const result = COMMAND_DIFFS.sessionTable({ ingress }, {});

		expect(result.ingress).toEqual({
			total_sessions: 'mismatch',
			total_displayed: 'mismatch',
			total_up: 'mismatch',
			total_down: 'match',
			sessions: [
				{
					to: 'mismatch',
					from: 'mismatch',
					state: 'mismatch',
					rt: 'mismatch',
					p: 'mismatch',
					active_path: 'mismatch',
					style: 'mismatch',
					label_in: 'mismatch',
					label_out: 'mismatch',
					lsp_name: 'mismatch',
					status: 'deleted',
				},
			],
		});
		expect(result.egress).toEqual({
			total_sessions: 'match',
			total_displayed: 'match',
			total_up: 'match',
			total_down: 'match',
			sessions: [],
		});
		expect(Object.keys(result)).toEqual(['ingress', 'egress', 'transit']);
	});

	it('diffs the sessions inside each P2MP group', () => {
		const section = (state: string) => ({
			direction: 'Ingress' as const,
			total_sessions: 1,
			total_displayed: 1,
			total_up: state === 'Up' ? 1 : 0,
			total_down: state === 'Up' ? 0 : 1,
			groups: [{ name: 'p2mp-blue', branch_count: 1, sessions: [row('10.255.0.3', 'branch-1', state)] }],
		});

		const result = COMMAND_DIFFS.p2mpTable({ ingress: section('Up') }, { ingress: section('Dn') });

		expect(result.ingress).toEqual({
			total_sessions: 'match',
			total_displayed: 'match',
			total_up: 'mismatch',
			total_down: 'mismatch',
			groups: [
				{
					name: 'match',
					branch_count: 'match',
					sessions: [
						{
							to: 'match',
							from: 'match',
							state: 'mismatch',
							rt: 'match',
							p: 'match',
							active_path: 'match',
							style: 'match',
							label_in: 'match',
							label_out: 'match',
							lsp_name: 'match',
						},
					],
				},
			],
		});
	});

	it('matches two empty route summaries', () => {
		const empty = { autonomous_system: '', router_id: '', tables: [] };
		expect(diffCollections('routeSummary', empty, empty)).toEqual({
			autonomous_system: 'match',
			router_id: 'match',
			tables: [],
		});
	});
});
