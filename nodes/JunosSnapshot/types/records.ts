/**
 * Output of a segmenter lookup: the command's output text, or `undefined`
 * when the command (or the requested occurrence) is not in the transcript.
 */
export type RawSegment = string | undefined;

/** Writable view of a record while a parser is still filling it in. */
export type Draft<T> = { -readonly [K in keyof T]: T[K] };

// show arp no-resolve

export interface ArpEntry {
	readonly mac_address: string;
	readonly ip_address: string;
	readonly interface: string;
	readonly flags: string;
}

export interface ArpTable {
	readonly total_entries: number;
	readonly entries: readonly ArpEntry[];
}

// show vrrp summary

export interface VrrpAddress {
	readonly type: string; // 'lcl' | 'vip' | 'mas'
	readonly address: string;
}

export interface VrrpEntry {
	readonly interface: string;
	readonly state: string;
	readonly group: number;
	readonly vr_state: string;
	readonly vr_mode: string;
	readonly addresses: readonly VrrpAddress[];
}

export interface VrrpSummary {
	readonly entries: readonly VrrpEntry[];
}

// show lldp neighbors

export interface LldpNeighbor {
	readonly local_interface: string;
	readonly parent_interface: string;
	readonly chassis_id: string;
	readonly port_info: string;
	readonly system_name: string;
}

export interface LldpNeighbors {
	readonly entries: readonly LldpNeighbor[];
}

// show bfd session

export interface BfdSession {
	readonly address: string;
	readonly state: string;
	readonly interface: string;
	readonly detect_time: string;
	readonly transmit_interval: string;
	readonly multiplier: number;
}

export interface BfdSessions {
	readonly total_sessions: number;
	readonly total_clients: number;
	readonly transmit_rate: string;
	readonly receive_rate: string;
	readonly sessions: readonly BfdSession[];
}

// show rsvp neighbor

export interface RsvpNeighbor {
	readonly address: string;
	readonly idle: number;
	readonly up_down: string;
	readonly last_change: string;
	readonly hello_interval: number;
	readonly hello_tx_rx: string;
	readonly messages_received: number;
}

export interface RsvpNeighbors {
	readonly total_neighbors: number;
	readonly neighbors: readonly RsvpNeighbor[];
}

// show rsvp session / show mpls lsp

export type Direction = 'Ingress' | 'Egress' | 'Transit';

/**
 * One row of an RSVP session or MPLS LSP table. Ingress LSP rows carry
 * `p` and `active_path`; RSVP-style rows carry `style` and the labels.
 * Columns a row does not have are empty strings.
 */
export interface SessionRow {
	readonly to: string;
	readonly from: string;
	readonly state: string;
	readonly rt: number;
	readonly p: string;
	readonly active_path: string;
	readonly style: string;
	readonly label_in: string;
	readonly label_out: string;
	readonly lsp_name: string;
}

/**
 * Section totals are copied from the device's own summary lines and are
 * never recomputed from the rows.
 */
export interface SectionTotals {
	readonly direction: Direction;
	readonly total_sessions: number;
	readonly total_displayed: number;
	readonly total_up: number;
	readonly total_down: number;
}

export interface SessionSection extends SectionTotals {
	readonly sessions: readonly SessionRow[];
}

export interface SessionTable {
	readonly ingress?: SessionSection;
	readonly egress?: SessionSection;
	readonly transit?: SessionSection;
}

export interface P2mpGroup {
	readonly name: string;
	readonly branch_count: number;
	readonly sessions: readonly SessionRow[];
}

export interface P2mpSection extends SectionTotals {
	readonly groups: readonly P2mpGroup[];
}

export interface P2mpTable {
	readonly ingress?: P2mpSection;
	readonly egress?: P2mpSection;
	readonly transit?: P2mpSection;
}

/** Filtered (`| match ...`) session output: rows only, no sections. */
export interface SessionList {
	readonly sessions: readonly SessionRow[];
}

// show route table <table>

export interface NextHop {
	readonly selected: boolean;
	readonly to: string;
	readonly via: string;
	readonly detail: string;
}

export interface RouteEntry {
	readonly destination: string;
	readonly selection: string; // '*', '+', '-' or ''
	readonly protocol: string;
	readonly preference: string;
	readonly age: string;
	readonly metric: string;
	readonly local_preference: string;
	readonly learned_from: string;
	readonly as_path: string;
	readonly next_hops: readonly NextHop[];
}

export interface RouteTable {
	readonly table_name: string;
	readonly total_destinations: number;
	readonly total_routes: number;
	readonly active_routes: number;
	readonly holddown_routes: number;
	readonly hidden_routes: number;
	readonly routes: readonly RouteEntry[];
}

// show mpls interface

export interface MplsInterface {
	readonly interface: string;
	readonly state: string;
	readonly administrative_groups: string;
}

export interface MplsInterfaces {
	readonly interfaces: readonly MplsInterface[];
}

// show bgp summary

export interface BgpTableSummary {
	readonly table: string;
	readonly total_paths: number;
	readonly active_paths: number;
	readonly suppressed: number;
	readonly history: number;
	readonly damp_state: number;
	readonly pending: number;
}

export interface BgpRibSummary {
	readonly table: string;
	readonly active: number;
	readonly received: number;
	readonly accepted: number;
	readonly damped: number;
}

export interface BgpPeer {
	readonly peer_address: string;
	readonly peer_as: number;
	readonly input_messages: number;
	readonly output_messages: number;
	readonly output_queue: number;
	readonly flaps: number;
	readonly last_up_down: string;
	readonly state: string;
	readonly ribs: readonly BgpRibSummary[];
}

export interface BgpSummary {
	readonly total_groups: number;
	readonly total_peers: number;
	readonly down_peers: number;
	readonly tables: readonly BgpTableSummary[];
	readonly peers: readonly BgpPeer[];
}

// show bgp neighbor

export interface BgpNeighborTable {
	readonly name: string;
	readonly bit: string;
	readonly rib_state: string;
	readonly send_state: string;
	readonly active_prefixes: number;
	readonly received_prefixes: number;
	readonly accepted_prefixes: number;
	readonly suppressed_prefixes: number;
	readonly advertised_prefixes: number;
}

export interface BgpNeighbor {
	readonly peer_address: string;
	readonly peer_port: string;
	readonly peer_as: number;
	readonly local_address: string;
	readonly local_port: string;
	readonly local_as: number;
	readonly group: string;
	readonly routing_instance: string;
	readonly peer_type: string;
	readonly state: string;
	readonly flags: string;
	readonly last_state: string;
	readonly last_event: string;
	readonly last_error: string;
	readonly export_policy: string;
	readonly import_policy: string;
	readonly options: string;
	readonly holdtime: number;
	readonly preference: number;
	readonly number_of_flaps: number;
	readonly peer_id: string;
	readonly local_id: string;
	readonly active_holdtime: number;
	readonly keepalive_interval: number;
	readonly input_messages: number;
	readonly output_messages: number;
	readonly tables: readonly BgpNeighborTable[];
}

export interface BgpNeighbors {
	readonly neighbors: readonly BgpNeighbor[];
}

// show isis adjacency extensive

export interface IsisTransition {
	readonly when: string;
	readonly state: string;
	readonly event: string;
	readonly down_reason: string;
}

export interface IsisAdjacency {
	readonly system_name: string;
	readonly interface: string;
	readonly level: number;
	readonly state: string;
	readonly expires_in: string;
	readonly priority: number;
	readonly up_down_transitions: number;
	readonly last_transition: string;
	readonly circuit_type: number;
	readonly speaks: string;
	readonly topologies: string;
	readonly restart_capable: string;
	readonly adjacency_advertisement: string;
	readonly ip_addresses: string;
	readonly transitions: readonly IsisTransition[];
}

export interface IsisAdjacencies {
	readonly adjacencies: readonly IsisAdjacency[];
}

// show route summary

export interface RouteSummaryProtocol {
	readonly protocol: string;
	readonly routes: number;
	readonly active: number;
}

export interface RouteSummaryTable {
	readonly table_name: string;
	readonly destinations: number;
	readonly routes: number;
	readonly active: number;
	readonly holddown: number;
	readonly hidden: number;
	readonly protocols: readonly RouteSummaryProtocol[];
}

export interface RouteSummary {
	readonly autonomous_system: string;
	readonly router_id: string;
	readonly tables: readonly RouteSummaryTable[];
}

/** Parsed collection type produced by each parser kind. */
export interface ParserResultMap {
	arp: ArpTable;
	vrrp: VrrpSummary;
	lldp: LldpNeighbors;
	bfd: BfdSessions;
	rsvpNeighbor: RsvpNeighbors;
	sessionTable: SessionTable;
	p2mpTable: P2mpTable;
	sessionList: SessionList;
	routeTable: RouteTable;
	mplsInterface: MplsInterfaces;
	bgpSummary: BgpSummary;
	bgpNeighbor: BgpNeighbors;
	isisAdjacency: IsisAdjacencies;
	routeSummary: RouteSummary;
}

export type ParserKind = keyof ParserResultMap;

export type RecordCollection = ParserResultMap[ParserKind];
