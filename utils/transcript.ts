import fs from 'fs-extra';

/** LF line endings, no byte-order mark. */
export function normalizeTranscript(text: string): string {
	return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

export async function readTranscript(file: string): Promise<string> {
	return normalizeTranscript(await fs.readFile(file, 'utf8'));
}
