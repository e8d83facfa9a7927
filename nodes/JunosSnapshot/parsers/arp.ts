import type { ArpEntry, ArpTable, RawSegment } from '../types/records';
import { toInt, toLines } from './lines';

const ENTRY = /^([0-9a-f:]+)\s+(\d+\.\d+\.\d+\.\d+)\s+(\S+)\s+(\S+)/i;
const TOTAL = /^Total entries:\s*(\d+)/i;

/**
 * Parse `show arp no-resolve` output.
 *
 * ```
 * MAC Address       Address         Interface                Flags
 * 00:11:22:33:44:55 10.0.0.1        ge-0/0/0.0               none
 * Total entries: 1
 * ```
 *
 * `total_entries` comes from the trailer line; without one (or when it
 * reads 0) it is the number of parsed rows.
 */
export function parseArpNoResolve(segment: RawSegment): ArpTable {
	const entries: ArpEntry[] = [];
	let totalEntries = 0;

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		const total = TOTAL.exec(trimmed);
		if (total) {
			totalEntries = toInt(total[1]);
			continue;
		}
		const match = ENTRY.exec(trimmed);
		if (!match) continue;
		entries.push({
			mac_address: match[1],
			ip_address: match[2],
			interface: match[3],
			flags: match[4],
		});
	}

	return { total_entries: totalEntries === 0 ? entries.length : totalEntries, entries };
}
