/**
 * Shell prompt recognition for Junos transcripts (`user@host>`).
 *
 * Prompts are only recognised at line starts; a `user@host>` sequence in
 * the middle of a line is output text.
 */

const PROMPT_AT_LINE_START = /^(\S+)@(\S+?)>/;

export interface PromptLine {
	user: string;
	host: string;
	command: string;
}

export function isPromptLine(line: string): boolean {
	return PROMPT_AT_LINE_START.test(line);
}

/**
 * Offset of the first prompt line starting at or after `fromIndex`, or -1.
 * `fromIndex` should itself be a line start.
 */
export function findNextPrompt(text: string, fromIndex = 0): number {
	const scanner = /^\S+@\S+>/gm;
	scanner.lastIndex = fromIndex;
	const match = scanner.exec(text);
	return match ? match.index : -1;
}

export function splitPrompt(line: string): PromptLine | undefined {
	const match = PROMPT_AT_LINE_START.exec(line);
	if (!match) return undefined;
	return {
		user: match[1],
		host: match[2],
		command: line.slice(match[0].length).trim(),
	};
}
