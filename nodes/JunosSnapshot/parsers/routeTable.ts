import type { Draft, NextHop, RawSegment, RouteEntry, RouteTable } from '../types/records';
import { isIndented, ROUTING_TABLE_SUMMARY, splitProtocolPreference, toInt, toLines } from './lines';

const LEGEND = /^\+\s*=\s*Active Route/i;
/** `10.0.0.0/30        *[Direct/0] 5w0d 12:00:00` */
const ROUTE = /^(\S+)\s+([*+-]?)\[([^\]]+)\]\s*(.*)$/;
/** Further protocol entries for the same destination. */
const ALTERNATE_ROUTE = /^\s+([*+-]?)\[([^\]]+)\]\s*(.*)$/;
/** Long destinations wrap: the prefix stands alone and its entries follow. */
const DESTINATION_ONLY = /^([^\s{]\S*)$/;
const AS_PATH = /^\s+AS path:\s*(.*)$/;
const NEXT_HOP =
	/^\s+(>)?\s*(?:(Local|Receive|Discard|Reject|MultiRecv)\s+)?(?:to\s+(\S+)\s+)?via\s+([^,\s]+)(?:,\s*(.+))?$/;
const NEXT_HOP_KEYWORD = /^\s+(>)?\s*(Receive|Discard|Reject|MultiRecv|Multicast\b.*)$/;

const ROUTE_ATTRIBUTES: ReadonlyArray<[RegExp, 'metric' | 'local_preference' | 'learned_from']> = [
	[/^metric\s+(\S+)/i, 'metric'],
	[/^localpref\s+(\S+)/i, 'local_preference'],
	[/^from\s+(\S+)/i, 'learned_from'],
];

type OpenRoute = Draft<Omit<RouteEntry, 'next_hops'>> & { next_hops: NextHop[] };

function openRoute(destination: string, selection: string, bracketed: string, attributes: string): OpenRoute {
	const { protocol, preference } = splitProtocolPreference(bracketed);
	const route: OpenRoute = {
		destination,
		selection,
		protocol,
		preference,
		age: '',
		metric: '',
		local_preference: '',
		learned_from: '',
		as_path: '',
		next_hops: [],
	};

	// `5w0d 12:00:00, metric 2, localpref 100, from 10.2.2.2`
	attributes
		.split(',')
		.map((part) => part.trim())
		.filter((part) => part.length > 0)
		.forEach((part, index) => {
			for (const [pattern, field] of ROUTE_ATTRIBUTES) {
				const match = pattern.exec(part);
				if (match) {
					route[field] = match[1];
					return;
				}
			}
			if (index === 0) route.age = part;
		});

	return route;
}

/**
 * Parse `show route table <table>` output (inet.0, inet.3, mpls.0).
 *
 * Each `[PROTOCOL/PREF]` entry becomes one route; next-hop lines below it
 * are collected on that route.
 */
export function parseRouteTable(segment: RawSegment): RouteTable {
	const routes: RouteEntry[] = [];
	const summary = {
		table_name: '',
		total_destinations: 0,
		total_routes: 0,
		active_routes: 0,
		holddown_routes: 0,
		hidden_routes: 0,
	};
	let destination = '';
	let open: OpenRoute | undefined;

	const flush = (): void => {
		if (open) routes.push(open);
		open = undefined;
	};

	for (const raw of toLines(segment)) {
		const line = raw.trimEnd();
		const trimmed = line.trim();
		if (!trimmed || LEGEND.test(trimmed)) continue;

		const tableSummary = ROUTING_TABLE_SUMMARY.exec(trimmed);
		if (tableSummary && !isIndented(line)) {
			flush();
			summary.table_name = tableSummary[1];
			summary.total_destinations = toInt(tableSummary[2]);
			summary.total_routes = toInt(tableSummary[3]);
			summary.active_routes = toInt(tableSummary[4]);
			summary.holddown_routes = toInt(tableSummary[5]);
			summary.hidden_routes = toInt(tableSummary[6]);
			continue;
		}

		const route = ROUTE.exec(line);
		if (route) {
			flush();
			destination = route[1];
			open = openRoute(destination, route[2], route[3], route[4]);
			continue;
		}

		const alternate = ALTERNATE_ROUTE.exec(line);
		if (alternate) {
			flush();
			if (destination) open = openRoute(destination, alternate[1], alternate[2], alternate[3]);
			continue;
		}

		const asPath = AS_PATH.exec(line);
		if (asPath) {
			if (open) open.as_path = asPath[1].trim();
			continue;
		}

		const hop = NEXT_HOP.exec(line);
		if (hop) {
			open?.next_hops.push({
				selected: hop[1] === '>',
				to: hop[3] ?? '',
				via: hop[4],
				detail: [hop[2], hop[5]].filter(Boolean).join(', '),
			});
			continue;
		}

		const keyword = NEXT_HOP_KEYWORD.exec(line);
		if (keyword) {
			open?.next_hops.push({ selected: keyword[1] === '>', to: '', via: '', detail: keyword[2] });
			continue;
		}

		const bare = isIndented(line) ? null : DESTINATION_ONLY.exec(trimmed);
		if (bare) {
			flush();
			destination = bare[1];
		}
	}
	flush();

	return { ...summary, routes };
}
