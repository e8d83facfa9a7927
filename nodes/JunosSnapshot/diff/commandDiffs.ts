import type { DiffSpec, EntryDiff, FieldMap } from '../types/diff';
import type {
	ArpEntry,
	BfdSession,
	BgpNeighbor,
	BgpNeighborTable,
	BgpPeer,
	BgpTableSummary,
	Direction,
	IsisAdjacency,
	LldpNeighbor,
	MplsInterface,
	P2mpGroup,
	P2mpSection,
	ParserKind,
	ParserResultMap,
	RouteEntry,
	RouteSummaryTable,
	RsvpNeighbor,
	SessionRow,
	SessionSection,
	VrrpEntry,
} from '../types/records';
import { compareValues, diffRecords } from './DiffEngine';

// Ages, message counters, rates and countdown timers change between any two
// captures, so they are left out of the compared fields.

const ARP: DiffSpec<ArpEntry> = {
	key: ['ip_address'],
	fields: ['ip_address', 'mac_address', 'interface', 'flags'],
};

const VRRP: DiffSpec<VrrpEntry> = {
	key: ['interface', 'group'],
	fields: ['interface', 'state', 'group', 'vr_state', 'vr_mode', 'addresses'],
};

const LLDP: DiffSpec<LldpNeighbor> = {
	key: ['local_interface'],
	fields: ['local_interface', 'parent_interface', 'chassis_id', 'port_info', 'system_name'],
};

const BFD: DiffSpec<BfdSession> = {
	key: ['address'],
	fields: ['address', 'state', 'interface', 'detect_time', 'transmit_interval', 'multiplier'],
};

const RSVP_NEIGHBOR: DiffSpec<RsvpNeighbor> = {
	key: ['address'],
	fields: ['address', 'up_down', 'hello_interval'],
};

const SESSION: DiffSpec<SessionRow> = {
	key: ['to', 'from', 'lsp_name'],
	fields: ['to', 'from', 'state', 'rt', 'p', 'active_path', 'style', 'label_in', 'label_out', 'lsp_name'],
};

export function diffSessions(pre: readonly SessionRow[], post: readonly SessionRow[]): EntryDiff[] {
	return diffRecords(pre, post, SESSION);
}

const P2MP_GROUP: DiffSpec<P2mpGroup> = {
	key: ['name'],
	fields: ['name', 'branch_count', 'sessions'],
	nested: { sessions: diffSessions },
};

const ROUTE: DiffSpec<RouteEntry> = {
	key: ['destination', 'protocol'],
	fields: [
		'destination',
		'selection',
		'protocol',
		'preference',
		'metric',
		'local_preference',
		'learned_from',
		'as_path',
		'next_hops',
	],
};

const MPLS_INTERFACE: DiffSpec<MplsInterface> = {
	key: ['interface'],
	fields: ['interface', 'state', 'administrative_groups'],
};

const BGP_TABLE: DiffSpec<BgpTableSummary> = {
	key: ['table'],
	fields: ['table', 'total_paths', 'active_paths', 'suppressed', 'history', 'damp_state', 'pending'],
};

const BGP_PEER: DiffSpec<BgpPeer> = {
	key: ['peer_address'],
	fields: ['peer_address', 'peer_as', 'flaps', 'state', 'ribs'],
};

const BGP_NEIGHBOR_TABLE: DiffSpec<BgpNeighborTable> = {
	key: ['name'],
	fields: [
		'name',
		'bit',
		'rib_state',
		'send_state',
		'active_prefixes',
		'received_prefixes',
		'accepted_prefixes',
		'suppressed_prefixes',
		'advertised_prefixes',
	],
};

const BGP_NEIGHBOR: DiffSpec<BgpNeighbor> = {
	key: ['peer_address'],
	fields: [
		'peer_address',
		'peer_as',
		'local_address',
		'local_as',
		'group',
		'routing_instance',
		'peer_type',
		'state',
		'flags',
		'last_state',
		'last_event',
		'last_error',
		'export_policy',
		'import_policy',
		'options',
		'holdtime',
		'preference',
		'number_of_flaps',
		'peer_id',
		'local_id',
		'active_holdtime',
		'keepalive_interval',
		'tables',
	],
	nested: { tables: (pre, post) => diffRecords(pre, post, BGP_NEIGHBOR_TABLE) },
};

const ISIS_ADJACENCY: DiffSpec<IsisAdjacency> = {
	key: ['system_name', 'interface'],
	fields: [
		'system_name',
		'interface',
		'level',
		'state',
		'priority',
		'up_down_transitions',
		'circuit_type',
		'speaks',
		'topologies',
		'restart_capable',
		'adjacency_advertisement',
		'ip_addresses',
	],
};

const ROUTE_SUMMARY_TABLE: DiffSpec<RouteSummaryTable> = {
	key: ['table_name'],
	fields: ['table_name', 'destinations', 'routes', 'active', 'holddown', 'hidden', 'protocols'],
};

type Sectioned<S> = { readonly ingress?: S; readonly egress?: S; readonly transit?: S };

const SECTION_KEYS = ['ingress', 'egress', 'transit'] as const;
const SECTION_DIRECTIONS: Record<(typeof SECTION_KEYS)[number], Direction> = {
	ingress: 'Ingress',
	egress: 'Egress',
	transit: 'Transit',
};

/** Sections are aligned by direction; a missing section compares as an empty one. */
function diffSections<S>(
	pre: Sectioned<S>,
	post: Sectioned<S>,
	empty: (direction: Direction) => S,
	diffSection: (pre: S, post: S) => FieldMap,
): FieldMap {
	const result: FieldMap = {};
	for (const key of SECTION_KEYS) {
		const direction = SECTION_DIRECTIONS[key];
		result[key] = diffSection(pre[key] ?? empty(direction), post[key] ?? empty(direction));
	}
	return result;
}

function sectionTotals(pre: SessionSection | P2mpSection, post: SessionSection | P2mpSection): FieldMap {
	return {
		total_sessions: compareValues(pre.total_sessions, post.total_sessions),
		total_displayed: compareValues(pre.total_displayed, post.total_displayed),
		total_up: compareValues(pre.total_up, post.total_up),
		total_down: compareValues(pre.total_down, post.total_down),
	};
}

const emptySessionSection = (direction: Direction): SessionSection => ({
	direction,
	total_sessions: 0,
	total_displayed: 0,
	total_up: 0,
	total_down: 0,
	sessions: [],
});

const emptyP2mpSection = (direction: Direction): P2mpSection => ({
	direction,
	total_sessions: 0,
	total_displayed: 0,
	total_up: 0,
	total_down: 0,
	groups: [],
});

export type CommandDiffer<K extends ParserKind> = (pre: ParserResultMap[K], post: ParserResultMap[K]) => FieldMap;

/** Comparison of two parsed collections, per parser kind. */
export const COMMAND_DIFFS: { readonly [K in ParserKind]: CommandDiffer<K> } = {
	arp: (pre, post) => ({
		total_entries: compareValues(pre.total_entries, post.total_entries),
		entries: diffRecords(pre.entries, post.entries, ARP),
	}),
	vrrp: (pre, post) => ({ entries: diffRecords(pre.entries, post.entries, VRRP) }),
	lldp: (pre, post) => ({ entries: diffRecords(pre.entries, post.entries, LLDP) }),
	bfd: (pre, post) => ({
		total_sessions: compareValues(pre.total_sessions, post.total_sessions),
		total_clients: compareValues(pre.total_clients, post.total_clients),
		sessions: diffRecords(pre.sessions, post.sessions, BFD),
	}),
	rsvpNeighbor: (pre, post) => ({
		total_neighbors: compareValues(pre.total_neighbors, post.total_neighbors),
		neighbors: diffRecords(pre.neighbors, post.neighbors, RSVP_NEIGHBOR),
	}),
	sessionTable: (pre, post) =>
		diffSections(pre, post, emptySessionSection, (a, b) => ({
			...sectionTotals(a, b),
			sessions: diffSessions(a.sessions, b.sessions),
		})),
	p2mpTable: (pre, post) =>
		diffSections(pre, post, emptyP2mpSection, (a, b) => ({
			...sectionTotals(a, b),
			groups: diffRecords(a.groups, b.groups, P2MP_GROUP),
		})),
	sessionList: (pre, post) => ({ sessions: diffSessions(pre.sessions, post.sessions) }),
	routeTable: (pre, post) => ({
		table_name: compareValues(pre.table_name, post.table_name),
		total_destinations: compareValues(pre.total_destinations, post.total_destinations),
		total_routes: compareValues(pre.total_routes, post.total_routes),
		active_routes: compareValues(pre.active_routes, post.active_routes),
		holddown_routes: compareValues(pre.holddown_routes, post.holddown_routes),
		hidden_routes: compareValues(pre.hidden_routes, post.hidden_routes),
		routes: diffRecords(pre.routes, post.routes, ROUTE),
	}),
	mplsInterface: (pre, post) => ({
		interfaces: diffRecords(pre.interfaces, post.interfaces, MPLS_INTERFACE),
	}),
	bgpSummary: (pre, post) => ({
		total_groups: compareValues(pre.total_groups, post.total_groups),
		total_peers: compareValues(pre.total_peers, post.total_peers),
		down_peers: compareValues(pre.down_peers, post.down_peers),
		tables: diffRecords(pre.tables, post.tables, BGP_TABLE),
		peers: diffRecords(pre.peers, post.peers, BGP_PEER),
	}),
	bgpNeighbor: (pre, post) => ({ neighbors: diffRecords(pre.neighbors, post.neighbors, BGP_NEIGHBOR) }),
	isisAdjacency: (pre, post) => ({
		adjacencies: diffRecords(pre.adjacencies, post.adjacencies, ISIS_ADJACENCY),
	}),
	routeSummary: (pre, post) => ({
		autonomous_system: compareValues(pre.autonomous_system, post.autonomous_system),
		router_id: compareValues(pre.router_id, post.router_id),
		tables: diffRecords(pre.tables, post.tables, ROUTE_SUMMARY_TABLE),
	}),
};

export function diffCollections<K extends ParserKind>(
	kind: K,
	pre: ParserResultMap[K],
	post: ParserResultMap[K],
): FieldMap {
	const differ: CommandDiffer<K> = COMMAND_DIFFS[kind];
	return differ(pre, post);
}
