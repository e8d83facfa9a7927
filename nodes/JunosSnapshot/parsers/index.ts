import type { ParserKind, ParserResultMap, RawSegment } from '../types/records';
import { parseArpNoResolve } from './arp';
import { parseBfdSession } from './bfd';
import { parseBgpNeighbor } from './bgpNeighbor';
import { parseBgpSummary } from './bgpSummary';
import { parseIsisAdjacency } from './isisAdjacency';
import { parseLldpNeighbors } from './lldp';
import { parseMplsInterface } from './mplsInterface';
import { parseRouteSummary } from './routeSummary';
import { parseRouteTable } from './routeTable';
import { parseRsvpNeighbor } from './rsvpNeighbor';
import { parseP2mpTable, parseSessionList, parseSessionRow, parseSessionTable } from './sessions';
import { parseVrrpSummary } from './vrrp';

export type RecordParser<K extends ParserKind> = (segment: RawSegment) => ParserResultMap[K];

export const PARSERS: { readonly [K in ParserKind]: RecordParser<K> } = {
	arp: parseArpNoResolve,
	vrrp: parseVrrpSummary,
	lldp: parseLldpNeighbors,
	bfd: parseBfdSession,
	rsvpNeighbor: parseRsvpNeighbor,
	sessionTable: parseSessionTable,
	p2mpTable: parseP2mpTable,
	sessionList: parseSessionList,
	routeTable: parseRouteTable,
	mplsInterface: parseMplsInterface,
	bgpSummary: parseBgpSummary,
	bgpNeighbor: parseBgpNeighbor,
	isisAdjacency: parseIsisAdjacency,
	routeSummary: parseRouteSummary,
};

export function parseSegment<K extends ParserKind>(kind: K, segment: RawSegment): ParserResultMap[K] {
	const parser: RecordParser<K> = PARSERS[kind];
	return parser(segment);
}

export {
	parseArpNoResolve,
	parseBfdSession,
	parseBgpNeighbor,
	parseBgpSummary,
	parseIsisAdjacency,
	parseLldpNeighbors,
	parseMplsInterface,
	parseP2mpTable,
	parseRouteSummary,
	parseRouteTable,
	parseRsvpNeighbor,
	parseSessionList,
	parseSessionRow,
	parseSessionTable,
	parseVrrpSummary,
};
