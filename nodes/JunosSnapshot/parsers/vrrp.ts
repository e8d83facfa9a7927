import type { RawSegment, VrrpAddress, VrrpEntry, VrrpSummary } from '../types/records';
import { isIndented, toInt, toLines } from './lines';

const ENTRY = /^(\S+)\s+(\S+)\s+(\d+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)/;
const EXTRA_ADDRESS = /^(\S+)\s+(\S+)$/;

interface OpenEntry {
	entry: Omit<VrrpEntry, 'addresses'>;
	addresses: VrrpAddress[];
}

/**
 * Parse `show vrrp summary` output. The first address sits on the entry
 * line; each further address (`vip`, `mas`) is on an indented line of its
 * own and belongs to the entry above it.
 *
 * ```
 * Interface     State       Group   VR state       VR Mode    Type   Address
 * ge-1/1/5.605  up              1   master          Active    lcl    100.70.16.19
 *                                                             vip    100.70.16.17
 * ```
 */
export function parseVrrpSummary(segment: RawSegment): VrrpSummary {
	const entries: VrrpEntry[] = [];
	let open: OpenEntry | undefined;

	const flush = (): void => {
		if (open) entries.push({ ...open.entry, addresses: open.addresses });
		open = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith('Interface')) continue;

		const main = isIndented(line) ? null : ENTRY.exec(trimmed);
		if (main) {
			flush();
			open = {
				entry: {
					interface: main[1],
					state: main[2],
					group: toInt(main[3]),
					vr_state: main[4],
					vr_mode: main[5],
				},
				addresses: [{ type: main[6], address: main[7] }],
			};
			continue;
		}

		const extra = EXTRA_ADDRESS.exec(trimmed);
		if (extra && open) {
			open.addresses.push({ type: extra[1], address: extra[2] });
		}
	}
	flush();

	return { entries };
}
