import { describe, expect, it } from 'vitest';

import { parseVrrpSummary } from './vrrp';

describe('parseVrrpSummary', () => {
	it('collects continuation addresses on the entry above them', () => {
		const output = [
			'Interface     State       Group   VR state       VR Mode    Type   Address',
			'ge-1/1/5.605  up              1   master          Active    lcl    10.70.16.19',
			'                                                            vip    10.70.16.17',
			'ge-1/1/6.0    up              2   backup          Active    lcl    10.70.17.2',
		].join('\n');

		expect(parseVrrpSummary(output)).toEqual({
			entries: [
				{
					interface: 'ge-1/1/5.605',
					state: 'up',
					group: 1,
					vr_state: 'master',
					vr_mode: 'Active',
					addresses: [
						{ type: 'lcl', address: '10.70.16.19' },
						{ type: 'vip', address: '10.70.16.17' },
					],
				},
				{
					interface: 'ge-1/1/6.0',
					state: 'up',
					group: 2,
					vr_state: 'backup',
					vr_mode: 'Active',
					addresses: [{ type: 'lcl', address: '10.70.17.2' }],
				},
			],
		});
	});

	it('drops a continuation line with no open entry', () => {
		const output = '                 vip    10.70.16.17\nge-1/1/6.0 up 2 backup Active lcl 10.70.17.2';
		const summary = parseVrrpSummary(output);
		expect(summary.entries).toHaveLength(1);
		expect(summary.entries[0].addresses).toEqual([{ type: 'lcl', address: '10.70.17.2' }]);
	});

	it('flushes the last entry together with its trailing addresses', () => {
		const output = 'ge-0/0/0.0 up 7 master Active lcl 10.1.1.1\n   vip 10.1.1.3';
		expect(parseVrrpSummary(output).entries[0].addresses).toEqual([
			{ type: 'lcl', address: '10.1.1.1' },
			{ type: 'vip', address: '10.1.1.3' },
		]);
	});
});
