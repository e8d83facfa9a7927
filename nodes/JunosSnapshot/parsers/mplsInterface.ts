import type { MplsInterface, MplsInterfaces, RawSegment } from '../types/records';
import { splitTokens, toLines } from './lines';

/** Parse `show mpls interface` output: interface, state, admin groups. */
export function parseMplsInterface(segment: RawSegment): MplsInterfaces {
	const interfaces: MplsInterface[] = [];

	for (const line of toLines(segment)) {
		if (/^\s*Interface\s+State\b/i.test(line)) continue;
		const tokens = splitTokens(line);
		if (tokens.length < 2 || !/[\/.]/.test(tokens[0])) continue;
		interfaces.push({
			interface: tokens[0],
			state: tokens[1],
			administrative_groups: tokens.slice(2).join(' '),
		});
	}

	return { interfaces };
}
