import type {
	Direction,
	Draft,
	P2mpGroup,
	P2mpTable,
	RawSegment,
	SectionTotals,
	SessionList,
	SessionRow,
	SessionTable,
} from '../types/records';
import { isAddress, isUnsigned, splitTokens, toInt, toLines } from './lines';

/** `Ingress RSVP: 21 sessions`, `Transit LSP: 0 sessions` */
const SECTION_HEADER = /^(Ingress|Egress|Transit)\s+(?:RSVP|LSP):\s*(\d+)\s+sessions?/i;
/** `Total 2 displayed, Up 2, Down 0` */
const SECTION_TOTALS = /^Total\s+(\d+)\s+displayed,\s*Up\s+(\d+),\s*Down\s+(\d+)/i;
/** `P2MP name: vpls-1, P2MP branch count: 2` */
const P2MP_GROUP = /^P2MP name:\s*([^,]+?)\s*,\s*P2MP branch count:\s*(\d+)/i;
const COLUMN_HEADER = /^To\s+From\s+State\b/i;
const RESERVATION_STYLE = /^(FF|SE|WF)$/i;

type SectionKey = 'ingress' | 'egress' | 'transit';

const DIRECTIONS: Record<string, Direction> = {
	ingress: 'Ingress',
	egress: 'Egress',
	transit: 'Transit',
};

function sectionKey(direction: Direction): SectionKey {
	switch (direction) {
		case 'Ingress':
			return 'ingress';
		case 'Egress':
			return 'egress';
		case 'Transit':
			return 'transit';
	}
}

function openTotals(header: RegExpExecArray): Draft<SectionTotals> {
	return {
		direction: DIRECTIONS[header[1].toLowerCase()],
		total_sessions: toInt(header[2]),
		total_displayed: 0,
		total_up: 0,
		total_down: 0,
	};
}

function applyTotals(totals: Draft<SectionTotals>, trailer: RegExpExecArray): void {
	totals.total_displayed = toInt(trailer[1]);
	totals.total_up = toInt(trailer[2]);
	totals.total_down = toInt(trailer[3]);
}

/**
 * Parse one session row. Two layouts share the first four columns:
 *
 * ```
 * To         From       State   Rt Style Labelin Labelout LSPname      (RSVP, egress/transit LSP)
 * 10.0.0.2   10.0.0.1   Up       0  1 FF       -   299776 lsp-a
 * To         From       State Rt P     ActivePath       LSPname         (ingress LSP)
 * 10.0.0.3   10.0.0.1   Up     0 *     primary          lsp-b
 * ```
 *
 * Anything else (headers, totals, legend lines) yields `undefined`.
 */
export function parseSessionRow(line: string): SessionRow | undefined {
	const tokens = splitTokens(line);
	if (tokens.length < 5) return undefined;
	const [to, from, state, rt, ...rest] = tokens;
	if (!isAddress(to) || !isAddress(from) || !isUnsigned(rt)) return undefined;

	const row: SessionRow = {
		to,
		from,
		state,
		rt: toInt(rt),
		p: '',
		active_path: '',
		style: '',
		label_in: '',
		label_out: '',
		lsp_name: '',
	};

	if (rest.length >= 4 && isUnsigned(rest[0]) && RESERVATION_STYLE.test(rest[1])) {
		return {
			...row,
			style: `${rest[0]} ${rest[1]}`,
			label_in: rest[2],
			label_out: rest[3],
			lsp_name: rest.slice(4).join(' '),
		};
	}

	const p = rest[0] === '*' ? '*' : '';
	const remaining = p ? rest.slice(1) : rest;
	if (remaining.length === 0) return undefined;
	return {
		...row,
		p,
		active_path: remaining.slice(0, -1).join(' '),
		lsp_name: remaining[remaining.length - 1],
	};
}

interface OpenSection {
	totals: Draft<SectionTotals>;
	sessions: SessionRow[];
}

/**
 * Parse `show rsvp session` / `show mpls lsp` output: up to three
 * direction sections, each with its own header and totals trailer.
 */
export function parseSessionTable(segment: RawSegment): SessionTable {
	const table: Draft<SessionTable> = {};
	let section: OpenSection | undefined;

	const closeSection = (): void => {
		if (section) {
			table[sectionKey(section.totals.direction)] = { ...section.totals, sessions: section.sessions };
		}
		section = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();

		const header = SECTION_HEADER.exec(trimmed);
		if (header) {
			closeSection();
			section = { totals: openTotals(header), sessions: [] };
			continue;
		}
		const trailer = SECTION_TOTALS.exec(trimmed);
		if (trailer) {
			if (section) applyTotals(section.totals, trailer);
			continue;
		}
		if (COLUMN_HEADER.test(trimmed)) continue;

		const row = parseSessionRow(trimmed);
		if (row && section) section.sessions.push(row);
	}
	closeSection();

	return table;
}

interface OpenP2mpSection {
	totals: Draft<SectionTotals>;
	groups: P2mpGroup[];
}

interface OpenGroup {
	name: string;
	branch_count: number;
	sessions: SessionRow[];
}

/**
 * Parse `show mpls lsp p2mp` output: direction sections containing P2MP
 * groups, each group containing its branch rows. Rows seen outside a group
 * are dropped.
 */
export function parseP2mpTable(segment: RawSegment): P2mpTable {
	const table: Draft<P2mpTable> = {};
	let section: OpenP2mpSection | undefined;
	let group: OpenGroup | undefined;

	const closeGroup = (): void => {
		if (section && group) section.groups.push(group);
		group = undefined;
	};
	const closeSection = (): void => {
		closeGroup();
		if (section) {
			table[sectionKey(section.totals.direction)] = { ...section.totals, groups: section.groups };
		}
		section = undefined;
	};

	for (const line of toLines(segment)) {
		const trimmed = line.trim();

		const header = SECTION_HEADER.exec(trimmed);
		if (header) {
			closeSection();
			section = { totals: openTotals(header), groups: [] };
			continue;
		}
		const groupHeader = P2MP_GROUP.exec(trimmed);
		if (groupHeader) {
			closeGroup();
			if (section) {
				group = { name: groupHeader[1], branch_count: toInt(groupHeader[2]), sessions: [] };
			}
			continue;
		}
		const trailer = SECTION_TOTALS.exec(trimmed);
		if (trailer) {
			closeGroup();
			if (section) applyTotals(section.totals, trailer);
			continue;
		}
		if (COLUMN_HEADER.test(trimmed)) continue;

		const row = parseSessionRow(trimmed);
		if (row && group) group.sessions.push(row);
	}
	closeSection();

	return table;
}

/** Parse `| match ...` filtered session output: bare rows, no sections. */
export function parseSessionList(segment: RawSegment): SessionList {
	const sessions: SessionRow[] = [];
	for (const line of toLines(segment)) {
		const row = parseSessionRow(line);
		if (row) sessions.push(row);
	}
	return { sessions };
}
