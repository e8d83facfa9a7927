import type { Draft, RawSegment, RouteSummary, RouteSummaryProtocol, RouteSummaryTable } from '../types/records';
import { ROUTING_TABLE_SUMMARY, toInt, toLines } from './lines';

const AUTONOMOUS_SYSTEM = /^Autonomous system number:\s*(\S+)/i;
const ROUTER_ID = /^Router ID:\s*(\S+)/i;
/** `Direct:      4 routes,      4 active` */
const PROTOCOL = /^(\S+):\s+(\d+)\s+routes?,\s+(\d+)\s+active/i;

type OpenTable = Draft<Omit<RouteSummaryTable, 'protocols'>> & { protocols: RouteSummaryProtocol[] };

/** Parse `show route summary` output: one table per summary line, protocol rows below it. */
export function parseRouteSummary(segment: RawSegment): RouteSummary {
	const summary = { autonomous_system: '', router_id: '' };
	const tables: RouteSummaryTable[] = [];
	let open: OpenTable | undefined;

	const flush = (): void => {
		if (open) tables.push(open);
		open = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		if (!trimmed) continue;

		const as = AUTONOMOUS_SYSTEM.exec(trimmed);
		if (as) {
			summary.autonomous_system = as[1];
			continue;
		}
		const routerId = ROUTER_ID.exec(trimmed);
		if (routerId) {
			summary.router_id = routerId[1];
			continue;
		}

		const table = ROUTING_TABLE_SUMMARY.exec(trimmed);
		if (table) {
			flush();
			open = {
				table_name: table[1],
				destinations: toInt(table[2]),
				routes: toInt(table[3]),
				active: toInt(table[4]),
				holddown: toInt(table[5]),
				hidden: toInt(table[6]),
				protocols: [],
			};
			continue;
		}

		const protocol = PROTOCOL.exec(trimmed);
		if (protocol && open) {
			open.protocols.push({
				protocol: protocol[1],
				routes: toInt(protocol[2]),
				active: toInt(protocol[3]),
			});
		}
	}
	flush();

	return { ...summary, tables };
}
