import type { BgpPeer, BgpRibSummary, BgpSummary, BgpTableSummary, Draft, RawSegment } from '../types/records';
import { isAddress, isIndented, splitTokens, toInt, toLines } from './lines';

const COUNTS = /^Groups:\s*(\d+)\s+Peers:\s*(\d+)\s+Down peers:\s*(\d+)/i;
const TABLE_HEADER = /^Table\s+Tot Paths/i;
const PEER_HEADER = /^Peer\s+AS\s+/i;
const TABLE_NAME = /^(\S+)$/;
const TABLE_COUNTS = /^(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)$/;
const PEER_ROW = /^(\S+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(.+)$/;
const RIB_ROW = /^(\S+):\s+(\d+)\/(\d+)\/(\d+)\/(\d+)$/;
const RIB_COUNTS = /^(\d+)\/(\d+)\/(\d+)\/(\d+)$/;
// `1w2d 3:04:05`, `2d 11:22:33`
const LONG_UPTIME = /^\d+w(\d+d)?$|^\d+d$/;

type Section = 'preamble' | 'tables' | 'peers';

interface OpenPeer {
	peer: Omit<BgpPeer, 'ribs'>;
	ribs: BgpRibSummary[];
}

function ribFrom(table: string, counts: RegExpExecArray, offset: number): BgpRibSummary {
	return {
		table,
		active: toInt(counts[offset]),
		received: toInt(counts[offset + 1]),
		accepted: toInt(counts[offset + 2]),
		damped: toInt(counts[offset + 3]),
	};
}

/**
 * Split the tail of a peer row into the up/down time and the state. An
 * established peer with one RIB per table may show its counts inline
 * (`45:00 5/6/6/0 0/0/0/0`) instead of a state word; those counts map onto
 * the tables in the order they were listed.
 */
function splitPeerTail(
	tail: string,
	tables: readonly BgpTableSummary[],
): { last_up_down: string; state: string; ribs: BgpRibSummary[] } {
	const tokens = splitTokens(tail);
	const uptimeWidth = tokens.length > 1 && LONG_UPTIME.test(tokens[0]) ? 2 : 1;
	const lastUpDown = tokens.slice(0, uptimeWidth).join(' ');
	const rest = tokens.slice(uptimeWidth);

	const inline = rest.map((token) => RIB_COUNTS.exec(token));
	if (inline.length > 0 && inline.every((counts) => counts !== null)) {
		const ribs: BgpRibSummary[] = [];
		inline.forEach((counts, index) => {
			if (counts) ribs.push(ribFrom(tables[index]?.table ?? '', counts, 1));
		});
		return { last_up_down: lastUpDown, state: 'Establ', ribs };
	}
	return { last_up_down: lastUpDown, state: rest.join(' '), ribs: [] };
}

/** Parse `show bgp summary` output. */
export function parseBgpSummary(segment: RawSegment): BgpSummary {
	const summary: Draft<Omit<BgpSummary, 'tables' | 'peers'>> = {
		total_groups: 0,
		total_peers: 0,
		down_peers: 0,
	};
	const tables: BgpTableSummary[] = [];
	const peers: BgpPeer[] = [];
	let section: Section = 'preamble';
	let pendingTable: string | undefined;
	let open: OpenPeer | undefined;

	const flush = (): void => {
		if (open) peers.push({ ...open.peer, ribs: open.ribs });
		open = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		if (!trimmed) continue;

		const counts = COUNTS.exec(trimmed);
		if (counts) {
			summary.total_groups = toInt(counts[1]);
			summary.total_peers = toInt(counts[2]);
			summary.down_peers = toInt(counts[3]);
			continue;
		}
		if (TABLE_HEADER.test(trimmed)) {
			section = 'tables';
			continue;
		}
		if (PEER_HEADER.test(trimmed)) {
			section = 'peers';
			continue;
		}

		if (section === 'tables') {
			const tableCounts = TABLE_COUNTS.exec(trimmed);
			if (tableCounts && pendingTable !== undefined) {
				tables.push({
					table: pendingTable,
					total_paths: toInt(tableCounts[1]),
					active_paths: toInt(tableCounts[2]),
					suppressed: toInt(tableCounts[3]),
					history: toInt(tableCounts[4]),
					damp_state: toInt(tableCounts[5]),
					pending: toInt(tableCounts[6]),
				});
				pendingTable = undefined;
				continue;
			}
			const tableName = TABLE_NAME.exec(trimmed);
			if (tableName) {
				pendingTable = tableName[1];
				continue;
			}
		}

		const peer = isIndented(line) ? null : PEER_ROW.exec(trimmed);
		if (peer && isAddress(peer[1])) {
			flush();
			const tail = splitPeerTail(peer[7], tables);
			open = {
				peer: {
					peer_address: peer[1],
					peer_as: toInt(peer[2]),
					input_messages: toInt(peer[3]),
					output_messages: toInt(peer[4]),
					output_queue: toInt(peer[5]),
					flaps: toInt(peer[6]),
					last_up_down: tail.last_up_down,
					state: tail.state,
				},
				ribs: tail.ribs,
			};
			continue;
		}

		const rib = RIB_ROW.exec(trimmed);
		if (rib && open) open.ribs.push(ribFrom(rib[1], rib, 2));
	}
	flush();

	return { ...summary, tables, peers };
}
