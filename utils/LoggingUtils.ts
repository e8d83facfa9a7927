/**
 * Minimal logger the parsing pipeline reports through. n8n's `this.logger`
 * satisfies it, as does {@link LoggingUtils.console}.
 */
export interface SnapshotLogger {
	debug(message: string): void;
	warn(message: string): void;
}

/**
 * Console logging for the snapshot tools
 */
export class LoggingUtils {
	/**
	 * Warnings are always printed
	 */
	static warn(message: string): void {
		console.warn(`[JunosSnapshot] ${message}`);
	}

	/**
	 * Debug output is printed only when verbose logging is enabled
	 */
	static debug(message: string, verboseLogging: boolean): void {
		if (verboseLogging) {
			console.debug(`[JunosSnapshot DEBUG] ${message}`);
		}
	}

	/**
	 * One-line description of a segment for debug output
	 */
	static describeSegment(segment: string | undefined): string {
		if (segment === undefined) return 'absent';
		const lines = segment.split('\n');
		const first = lines[0].length > 60 ? `${lines[0].substring(0, 60)}...` : lines[0];
		return `${lines.length} line(s), starting "${first}"`;
	}

	/**
	 * Console-backed {@link SnapshotLogger}
	 */
	static console(verboseLogging: boolean): SnapshotLogger {
		return {
			debug: (message: string) => LoggingUtils.debug(message, verboseLogging),
			warn: (message: string) => LoggingUtils.warn(message),
		};
	}
}
