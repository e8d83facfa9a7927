import type { BgpNeighbor, BgpNeighborTable, BgpNeighbors, Draft, RawSegment } from '../types/records';
import { toInt, toLines } from './lines';

/** `Peer: 10.0.0.2+179 AS 65001    Local: 10.0.0.1+54321 AS 65000` */
const PEER = /^Peer:\s+([^\s+]+)(?:\+(\d+))?\s+AS\s+(\d+)\s+Local:\s+([^\s+]+)(?:\+(\d+))?\s+AS\s+(\d+)/i;
const TABLE = /^Table\s+(\S+)\s+Bit:\s*(\S+)/;

type OpenNeighbor = Draft<Omit<BgpNeighbor, 'tables'>> & { tables: Draft<BgpNeighborTable>[] };

interface LabelRule<T> {
	pattern: RegExp;
	apply: (match: RegExpExecArray, target: T) => void;
}

const NEIGHBOR_RULES: LabelRule<OpenNeighbor>[] = [
	{
		pattern: /^Group:\s*(\S+)(?:\s+Routing-Instance:\s*(\S+))?/,
		apply: (m, n) => {
			n.group = m[1];
			n.routing_instance = m[2] ?? '';
		},
	},
	{
		pattern: /^Type:\s*(\S+)\s+State:\s*(\S+)(?:\s+Flags:\s*(.*))?$/,
		apply: (m, n) => {
			n.peer_type = m[1];
			n.state = m[2];
			n.flags = (m[3] ?? '').trim();
		},
	},
	{
		pattern: /^Last State:\s*(\S+)\s+Last Event:\s*(\S+)/,
		apply: (m, n) => {
			n.last_state = m[1];
			n.last_event = m[2];
		},
	},
	{
		pattern: /^Last Error:\s*(.+)$/,
		apply: (m, n) => {
			n.last_error = m[1].trim();
		},
	},
	{
		pattern: /^Export:\s*\[\s*(.*?)\s*\](?:\s*Import:\s*\[\s*(.*?)\s*\])?/,
		apply: (m, n) => {
			n.export_policy = m[1];
			if (m[2] !== undefined) n.import_policy = m[2];
		},
	},
	{
		pattern: /^Import:\s*\[\s*(.*?)\s*\]/,
		apply: (m, n) => {
			n.import_policy = m[1];
		},
	},
	{
		// Junos may print several Options lines for one peer.
		pattern: /^Options:\s*(.*)$/,
		apply: (m, n) => {
			n.options = n.options ? `${n.options} ${m[1].trim()}` : m[1].trim();
		},
	},
	{
		pattern: /^Holdtime:\s*(\d+)\s+Preference:\s*(\d+)/,
		apply: (m, n) => {
			n.holdtime = toInt(m[1]);
			n.preference = toInt(m[2]);
		},
	},
	{
		pattern: /^Number of flaps:\s*(\d+)/,
		apply: (m, n) => {
			n.number_of_flaps = toInt(m[1]);
		},
	},
	{
		pattern: /^Peer ID:\s*(\S+)\s+Local ID:\s*(\S+)\s+Active Holdtime:\s*(\d+)/,
		apply: (m, n) => {
			n.peer_id = m[1];
			n.local_id = m[2];
			n.active_holdtime = toInt(m[3]);
		},
	},
	{
		pattern: /^Keepalive Interval:\s*(\d+)/,
		apply: (m, n) => {
			n.keepalive_interval = toInt(m[1]);
		},
	},
	{
		pattern: /^Input messages:\s*Total\s+(\d+)/,
		apply: (m, n) => {
			n.input_messages = toInt(m[1]);
		},
	},
	{
		pattern: /^Output messages:\s*Total\s+(\d+)/,
		apply: (m, n) => {
			n.output_messages = toInt(m[1]);
		},
	},
];

const TABLE_RULES: LabelRule<Draft<BgpNeighborTable>>[] = [
	{
		pattern: /^RIB State:\s*(.+)$/,
		apply: (m, t) => {
			if (!t.rib_state) t.rib_state = m[1].trim();
		},
	},
	{ pattern: /^Send state:\s*(.+)$/, apply: (m, t) => (t.send_state = m[1].trim()) },
	{ pattern: /^Active prefixes:\s*(\d+)/, apply: (m, t) => (t.active_prefixes = toInt(m[1])) },
	{ pattern: /^Received prefixes:\s*(\d+)/, apply: (m, t) => (t.received_prefixes = toInt(m[1])) },
	{ pattern: /^Accepted prefixes:\s*(\d+)/, apply: (m, t) => (t.accepted_prefixes = toInt(m[1])) },
	{ pattern: /^Suppressed due to damping:\s*(\d+)/, apply: (m, t) => (t.suppressed_prefixes = toInt(m[1])) },
	{ pattern: /^Advertised prefixes:\s*(\d+)/, apply: (m, t) => (t.advertised_prefixes = toInt(m[1])) },
];

function applyFirst<T>(rules: LabelRule<T>[], line: string, target: T): boolean {
	for (const rule of rules) {
		const match = rule.pattern.exec(line);
		if (match) {
			rule.apply(match, target);
			return true;
		}
	}
	return false;
}

function openNeighbor(peer: RegExpExecArray): OpenNeighbor {
	return {
		peer_address: peer[1],
		peer_port: peer[2] ?? '',
		peer_as: toInt(peer[3]),
		local_address: peer[4],
		local_port: peer[5] ?? '',
		local_as: toInt(peer[6]),
		group: '',
		routing_instance: '',
		peer_type: '',
		state: '',
		flags: '',
		last_state: '',
		last_event: '',
		last_error: '',
		export_policy: '',
		import_policy: '',
		options: '',
		holdtime: 0,
		preference: 0,
		number_of_flaps: 0,
		peer_id: '',
		local_id: '',
		active_holdtime: 0,
		keepalive_interval: 0,
		input_messages: 0,
		output_messages: 0,
		tables: [],
	};
}

/**
 * Parse `show bgp neighbor` output: one record per `Peer:` block, with the
 * per-table prefix counters collected under `tables`.
 */
export function parseBgpNeighbor(segment: RawSegment): BgpNeighbors {
	const neighbors: BgpNeighbor[] = [];
	let open: OpenNeighbor | undefined;
	let table: Draft<BgpNeighborTable> | undefined;

	const flush = (): void => {
		if (open) neighbors.push(open);
		open = undefined;
		table = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		if (!trimmed) continue;

		const peer = PEER.exec(trimmed);
		if (peer) {
			flush();
			open = openNeighbor(peer);
			continue;
		}
		if (!open) continue;

		const tableHeader = TABLE.exec(trimmed);
		if (tableHeader) {
			table = {
				name: tableHeader[1],
				bit: tableHeader[2],
				rib_state: '',
				send_state: '',
				active_prefixes: 0,
				received_prefixes: 0,
				accepted_prefixes: 0,
				suppressed_prefixes: 0,
				advertised_prefixes: 0,
			};
			open.tables.push(table);
			continue;
		}

		if (table && applyFirst(TABLE_RULES, trimmed, table)) continue;
		applyFirst(NEIGHBOR_RULES, trimmed, open);
	}
	flush();

	return { neighbors };
}
