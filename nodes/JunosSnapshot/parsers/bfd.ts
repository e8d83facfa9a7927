import type { BfdSession, BfdSessions, RawSegment } from '../types/records';
import { isAddress, isUnsigned, splitTokens, toInt, toLines } from './lines';

const SESSION_COUNT = /^(\d+)\s+sessions?,\s*(\d+)\s+clients?/i;
const RATES = /^Cumulative transmit rate\s+([\d.]+)\s*pps,\s*cumulative receive rate\s+([\d.]+)\s*pps/i;
const TIMER = /^\d+(\.\d+)?$/;

/**
 * Parse `show bfd session` output. Multihop sessions have no interface
 * column, so rows are either six or five columns wide.
 */
export function parseBfdSession(segment: RawSegment): BfdSessions {
	const sessions: BfdSession[] = [];
	let totalSessions = 0;
	let totalClients = 0;
	let transmitRate = '';
	let receiveRate = '';

	for (const line of toLines(segment)) {
		const trimmed = line.trim();

		const count = SESSION_COUNT.exec(trimmed);
		if (count) {
			totalSessions = toInt(count[1]);
			totalClients = toInt(count[2]);
			continue;
		}
		const rates = RATES.exec(trimmed);
		if (rates) {
			transmitRate = rates[1];
			receiveRate = rates[2];
			continue;
		}

		const tokens = splitTokens(trimmed);
		if (tokens.length !== 5 && tokens.length !== 6) continue;
		if (!isAddress(tokens[0]) || !isUnsigned(tokens[tokens.length - 1])) continue;
		const [detectTime, transmitInterval] = tokens.slice(-3, -1);
		if (!TIMER.test(detectTime) || !TIMER.test(transmitInterval)) continue;

		sessions.push({
			address: tokens[0],
			state: tokens[1],
			interface: tokens.length === 6 ? tokens[2] : '',
			detect_time: detectTime,
			transmit_interval: transmitInterval,
			multiplier: toInt(tokens[tokens.length - 1]),
		});
	}

	return {
		total_sessions: totalSessions,
		total_clients: totalClients,
		transmit_rate: transmitRate,
		receive_rate: receiveRate,
		sessions,
	};
}
