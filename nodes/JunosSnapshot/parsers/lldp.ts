import type { LldpNeighbor, LldpNeighbors, RawSegment } from '../types/records';
import { splitTokens, toLines } from './lines';

/**
 * Parse `show lldp neighbors` output. Port info may contain spaces
 * (`TenGigabitEthernet 1/1`); the system name is the last column.
 */
export function parseLldpNeighbors(segment: RawSegment): LldpNeighbors {
	const entries: LldpNeighbor[] = [];

	for (const line of toLines(segment)) {
		if (/^\s*Local Interface\b/i.test(line)) continue;
		const tokens = splitTokens(line);
		if (tokens.length < 5) continue;
		entries.push({
			local_interface: tokens[0],
			parent_interface: tokens[1],
			chassis_id: tokens[2],
			port_info: tokens.slice(3, -1).join(' '),
			system_name: tokens[tokens.length - 1],
		});
	}

	return { entries };
}
