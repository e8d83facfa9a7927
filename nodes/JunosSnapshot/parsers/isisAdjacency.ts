import type { Draft, IsisAdjacencies, IsisAdjacency, IsisTransition, RawSegment } from '../types/records';
import { isIndented, toInt, toLines } from './lines';

/** The adjacency's system name stands alone, unindented. */
const SYSTEM_NAME = /^([^\s{]\S*)$/;
const TRANSITION_LOG = /^Transition log:/i;
const TRANSITION_HEADER = /^When\s+State\s+Event/i;
/** `Mon Jan  1 00:00:00   Up   Seenself   ` */
const TRANSITION = /^(\w{3}\s+\w{3}\s+\d+\s+\d{1,2}:\d{2}:\d{2})\s+(\S+)\s+(\S+)(?:\s+(.+))?$/;

type OpenAdjacency = Draft<Omit<IsisAdjacency, 'transitions'>> & { transitions: IsisTransition[] };

const LABELS: ReadonlyArray<[RegExp, (m: RegExpExecArray, a: OpenAdjacency) => void]> = [
	[
		/^Interface:\s*([^,]+),\s*Level:\s*(\d+),\s*State:\s*([^,]+)(?:,\s*Expires in\s+(.+))?$/,
		(m, a) => {
			a.interface = m[1].trim();
			a.level = toInt(m[2]);
			a.state = m[3].trim();
			a.expires_in = (m[4] ?? '').trim();
		},
	],
	[
		/^Priority:\s*(\d+),\s*Up\/Down transitions:\s*(\d+),\s*Last transition:\s*(.+)$/,
		(m, a) => {
			a.priority = toInt(m[1]);
			a.up_down_transitions = toInt(m[2]);
			a.last_transition = m[3].trim();
		},
	],
	[
		/^Circuit type:\s*(\d+),\s*Speaks:\s*(.+)$/,
		(m, a) => {
			a.circuit_type = toInt(m[1]);
			a.speaks = m[2].trim();
		},
	],
	[/^Topologies:\s*(.+)$/, (m, a) => (a.topologies = m[1].trim())],
	[
		/^Restart capable:\s*([^,]+)(?:,\s*Adjacency advertisement:\s*(.+))?$/,
		(m, a) => {
			a.restart_capable = m[1].trim();
			a.adjacency_advertisement = (m[2] ?? '').trim();
		},
	],
	[/^IP addresses:\s*(.+)$/, (m, a) => (a.ip_addresses = m[1].trim())],
];

function openAdjacency(systemName: string): OpenAdjacency {
	return {
		system_name: systemName,
		interface: '',
		level: 0,
		state: '',
		expires_in: '',
		priority: 0,
		up_down_transitions: 0,
		last_transition: '',
		circuit_type: 0,
		speaks: '',
		topologies: '',
		restart_capable: '',
		adjacency_advertisement: '',
		ip_addresses: '',
		transitions: [],
	};
}

/**
 * Parse `show isis adjacency extensive` output. Each adjacency starts with
 * its system name on an unindented line; label lines fill it in and the
 * transition log rows are collected under `transitions`.
 */
export function parseIsisAdjacency(segment: RawSegment): IsisAdjacencies {
	const adjacencies: IsisAdjacency[] = [];
	let open: OpenAdjacency | undefined;
	let inLog = false;

	const flush = (): void => {
		if (open) adjacencies.push(open);
		open = undefined;
		inLog = false;
	};

	for (const raw of toLines(segment)) {
		const line = raw.trimEnd();
		const trimmed = line.trim();
		if (!trimmed) continue;

		const name = isIndented(line) ? null : SYSTEM_NAME.exec(trimmed);
		if (name) {
			flush();
			open = openAdjacency(name[1]);
			continue;
		}
		if (!open) continue;

		if (TRANSITION_LOG.test(trimmed)) {
			inLog = true;
			continue;
		}
		if (inLog) {
			if (TRANSITION_HEADER.test(trimmed)) continue;
			const row = TRANSITION.exec(trimmed);
			if (row) {
				open.transitions.push({
					when: row[1].replace(/\s+/g, ' '),
					state: row[2],
					event: row[3],
					down_reason: (row[4] ?? '').trim(),
				});
				continue;
			}
		}

		for (const [pattern, apply] of LABELS) {
			const match = pattern.exec(trimmed);
			if (match) {
				apply(match, open);
				inLog = false;
				break;
			}
		}
	}
	flush();

	return { adjacencies };
}
