import { normalizeTranscript } from '../../../utils/transcript';
import type { RawSegment } from '../types/records';
import { findNextPrompt, splitPrompt } from './PromptGrammar';

/**
 * `exact`: nothing but whitespace may follow the signature on the command line.
 * `prefix`: the command line may continue after the signature.
 */
export type MatchMode = 'exact' | 'prefix';

export interface CommandSignature {
	/** Command text as typed, pipe filters included, e.g. `show rsvp session | no-more`. */
	command: string;
	/** 1-based; defaults to the first occurrence. */
	occurrence?: number;
	/** Defaults to `prefix` for piped commands and `exact` for bare ones. */
	mode?: MatchMode;
}

const HSPACE = '[ \\t]';

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function resolveMode(signature: CommandSignature): MatchMode {
	if (signature.mode) return signature.mode;
	return signature.command.includes('|') ? 'prefix' : 'exact';
}

/**
 * Compile a signature into a line-anchored, case-insensitive pattern that
 * tolerates any horizontal whitespace between words and around pipes. The
 * line may start with the prompt the command was typed at.
 */
export function buildCommandPattern(signature: CommandSignature): RegExp {
	const stages = signature.command
		.split('|')
		.map((stage) => stage.trim())
		.filter((stage) => stage.length > 0);
	const body = stages
		.map((stage) => stage.split(/\s+/).map(escapeRegex).join(`${HSPACE}+`))
		.join(`${HSPACE}*\\|${HSPACE}*`);
	const tail = resolveMode(signature) === 'exact' ? `${HSPACE}*$` : `(?![^\\s|])[^\\n]*$`;
	return new RegExp(`^(?:\\S+@\\S+>)?${HSPACE}*${body}${tail}`, 'gim');
}

function trimBlock(block: string): RawSegment {
	const lines = block.split('\n').map((line) => line.trimEnd());
	let start = 0;
	let end = lines.length;
	while (start < end && lines[start] === '') start += 1;
	while (end > start && lines[end - 1] === '') end -= 1;
	if (start === end) return undefined;
	return lines.slice(start, end).join('\n');
}

/**
 * Output of every occurrence of the signature, in transcript order. An
 * occurrence with no output lines is kept as `undefined` so that
 * occurrence numbers stay aligned with the transcript.
 */
export function extractAllSegments(transcript: string, signature: CommandSignature): RawSegment[] {
	const text = normalizeTranscript(transcript);
	const segments: RawSegment[] = [];

	for (const match of text.matchAll(buildCommandPattern(signature))) {
		const commandEnd = (match.index ?? 0) + match[0].length;
		const lineEnd = text.indexOf('\n', commandEnd);
		if (lineEnd === -1) {
			segments.push(undefined);
			continue;
		}
		const bodyStart = lineEnd + 1;
		const nextPrompt = findNextPrompt(text, bodyStart);
		const bodyEnd = nextPrompt === -1 ? text.length : nextPrompt;
		segments.push(trimBlock(text.slice(bodyStart, bodyEnd)));
	}

	return segments;
}

/**
 * Output of the requested occurrence of a command, without the command
 * line, the next prompt or surrounding blank lines. `undefined` means the
 * command (or that occurrence of it) is not in the transcript.
 */
export function extractSegment(transcript: string, signature: CommandSignature): RawSegment {
	const occurrence = signature.occurrence ?? 1;
	if (!Number.isInteger(occurrence) || occurrence < 1) return undefined;
	return extractAllSegments(transcript, signature)[occurrence - 1];
}

/** Commands typed at each prompt, in order. Bare prompts are skipped. */
export function listCommands(transcript: string): string[] {
	const commands: string[] = [];
	for (const line of normalizeTranscript(transcript).split('\n')) {
		const prompt = splitPrompt(line);
		if (prompt && prompt.command.length > 0) commands.push(prompt.command);
	}
	return commands;
}
