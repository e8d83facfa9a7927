import type { CommandSignature } from './segmenter/Segmenter';
import type { ParserKind } from './types/records';

export const CATALOGUE_VERSION = '1.0.0';

export interface CatalogueEntry {
	id: string;
	signature: CommandSignature;
	kind: ParserKind;
}

/**
 * Commands a snapshot is expected to contain, in report order. Piped
 * signatures match as a prefix of the command line, bare ones exactly, so
 * `show rsvp session` never picks up `show rsvp session | no-more`.
 */
export const CATALOGUE: readonly CatalogueEntry[] = [
	{ id: 'show_arp_no_resolve', signature: { command: 'show arp no-resolve | no-more' }, kind: 'arp' },
	{ id: 'show_vrrp_summary', signature: { command: 'show vrrp summary | no-more' }, kind: 'vrrp' },
	{ id: 'show_lldp_neighbors', signature: { command: 'show lldp neighbors | no-more' }, kind: 'lldp' },
	{ id: 'show_bfd_session', signature: { command: 'show bfd session | no-more' }, kind: 'bfd' },
	{ id: 'show_rsvp_neighbor', signature: { command: 'show rsvp neighbor | no-more' }, kind: 'rsvpNeighbor' },
	{ id: 'show_rsvp_session', signature: { command: 'show rsvp session | no-more' }, kind: 'sessionTable' },
	{ id: 'show_route_table_inet0', signature: { command: 'show route table inet.0 | no-more' }, kind: 'routeTable' },
	{ id: 'show_route_table_inet3', signature: { command: 'show route table inet.3 | no-more' }, kind: 'routeTable' },
	{ id: 'show_route_table_mpls0', signature: { command: 'show route table mpls.0 | no-more' }, kind: 'routeTable' },
	{ id: 'show_mpls_interface', signature: { command: 'show mpls interface | no-more' }, kind: 'mplsInterface' },
	{ id: 'show_mpls_lsp', signature: { command: 'show mpls lsp | no-more' }, kind: 'sessionTable' },
	{ id: 'show_mpls_lsp_p2mp', signature: { command: 'show mpls lsp p2mp | no-more' }, kind: 'p2mpTable' },
	{ id: 'show_bgp_summary', signature: { command: 'show bgp summary | no-more' }, kind: 'bgpSummary' },
	{ id: 'show_bgp_neighbor', signature: { command: 'show bgp neighbor | no-more' }, kind: 'bgpNeighbor' },
	{
		id: 'show_isis_adjacency_extensive',
		signature: { command: 'show isis adjacency extensive | no-more' },
		kind: 'isisAdjacency',
	},
	{ id: 'show_route_summary', signature: { command: 'show route summary | no-more' }, kind: 'routeSummary' },
	{
		id: 'show_rsvp_session_match_dn',
		signature: { command: 'show rsvp session | match DN | no-more' },
		kind: 'sessionList',
	},
	{
		id: 'show_mpls_lsp_unidirectional_match_dn',
		signature: { command: 'show mpls lsp unidirectional | match Dn | no-more' },
		kind: 'sessionList',
	},
	{ id: 'show_rsvp_session_first', signature: { command: 'show rsvp session', occurrence: 1 }, kind: 'sessionTable' },
	{ id: 'show_rsvp_session_second', signature: { command: 'show rsvp session', occurrence: 2 }, kind: 'sessionTable' },
	{
		id: 'show_rsvp_session_ma_no_more',
		signature: { command: 'show rsvp session | ma no-more' },
		kind: 'sessionList',
	},
	{
		id: 'show_mpls_lsp_unidirectional',
		signature: { command: 'show mpls lsp unidirectional | no-more' },
		kind: 'sessionTable',
	},
];

export function findCatalogueEntry(id: string): CatalogueEntry | undefined {
	return CATALOGUE.find((entry) => entry.id === id);
}
