import type { RawSegment, RsvpNeighbor, RsvpNeighbors } from '../types/records';
import { isAddress, toInt, toLines } from './lines';

const LEARNED = /^RSVP neighbor:\s*(\d+)\s+learned/i;
// LastChange may itself contain a space (`1w2d 03:18:27`).
const ROW = /^(\S+)\s+(\d+)\s+(\d+\/\d+)\s+(.+?)\s+(\d+)\s+(\d+\/\d+)\s+(\d+)$/;

export function parseRsvpNeighbor(segment: RawSegment): RsvpNeighbors {
	const neighbors: RsvpNeighbor[] = [];
	let totalNeighbors = 0;

	for (const line of toLines(segment)) {
		const trimmed = line.trim();
		const learned = LEARNED.exec(trimmed);
		if (learned) {
			totalNeighbors = toInt(learned[1]);
			continue;
		}
		const match = ROW.exec(trimmed);
		if (!match || !isAddress(match[1])) continue;
		neighbors.push({
			address: match[1],
			idle: toInt(match[2]),
			up_down: match[3],
			last_change: match[4],
			hello_interval: toInt(match[5]),
			hello_tx_rx: match[6],
			messages_received: toInt(match[7]),
		});
	}

	return { total_neighbors: totalNeighbors, neighbors };
}
