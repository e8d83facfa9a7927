import type { RawSegment } from '../types/records';

/** Lines of a segment; an absent or blank segment has none. */
export function toLines(segment: RawSegment): string[] {
	if (segment === undefined || segment.trim() === '') return [];
	return segment.split(/\r?\n/);
}

export function splitTokens(line: string): string[] {
	const trimmed = line.trim();
	return trimmed === '' ? [] : trimmed.split(/\s+/);
}

export function toInt(value: string | undefined): number {
	if (value === undefined) return 0;
	const n = parseInt(value, 10);
	return Number.isNaN(n) ? 0 : n;
}

export function isIndented(line: string): boolean {
	return /^\s/.test(line);
}

/** IPv4 or IPv6 literal, without prefix length. */
export function isAddress(token: string): boolean {
	return /^[0-9a-f.:]+$/i.test(token) && /[.:]/.test(token) && /\d/.test(token);
}

export function isUnsigned(token: string | undefined): boolean {
	return token !== undefined && /^\d+$/.test(token);
}

/**
 * `Static/5` -> Static + 5, `RSVP/7/1` -> RSVP + 7/1, `Direct` -> Direct + ''.
 */
export function splitProtocolPreference(bracketed: string): { protocol: string; preference: string } {
	const [protocol, ...preference] = bracketed.trim().split('/');
	return { protocol, preference: preference.join('/') };
}

/** `inet.0: 12 destinations, 14 routes (12 active, 0 holddown, 0 hidden)` */
export const ROUTING_TABLE_SUMMARY =
	/^(\S+):\s+(\d+)\s+destinations?,\s+(\d+)\s+routes?\s+\((\d+)\s+active,\s+(\d+)\s+holddown,\s+(\d+)\s+hidden\)/i;
