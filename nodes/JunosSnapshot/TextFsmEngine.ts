import type {
	Action,
	CompiledPattern,
	CompiledState,
	CompiledTemplate,
	ParsedRecord,
	ParsedResult,
	Template,
	Variable,
} from './types/template';

export interface EngineOptions {
	debug?: boolean;
	resetOnEmit?: boolean; // clear working values after each emit
	coerceTypes?: boolean;
}

export interface TraceEntry {
	line: string;
	state: string;
	matchedIdx: number;
}

/**
 * Line-driven state machine over a {@link Template}. In each state the first
 * matching pattern wins: its named groups are copied into the working record,
 * its actions run, and its transition selects the next state.
 */
export class TextFsmEngine {
	private compiledCache: Map<string, CompiledTemplate> = new Map();

	parseSegment(segment: string, template: Template, options: EngineOptions = {}): ParsedResult & { trace?: TraceEntry[] } {
		const compiled = this.getOrCompile(template);
		const lines = segment.split(/\r?\n/);
		const records: ParsedRecord[] = [];
		const working: ParsedRecord = {};
		const trace: TraceEntry[] = [];
		const errors: string[] = [];

		const variableIndex = new Map<string, Variable>();
		for (const v of template.variables ?? []) variableIndex.set(v.name, v);
		const valueOf = (name: string, raw: string): unknown =>
			options.coerceTypes ? this.coerceValue(name, raw, variableIndex) : raw;

		let currentStateName = compiled.startState;
		let linesProcessed = 0;
		let matches = 0;

		for (const line of lines) {
			const state = compiled.states.get(currentStateName);
			if (!state) {
				errors.push(`Unknown state: ${currentStateName}`);
				break;
			}
			linesProcessed += 1;

			const hit = this.firstMatch(state, line);
			if (options.debug) trace.push({ line, state: currentStateName, matchedIdx: hit ? hit.index : -1 });
			if (!hit) continue;
			matches += 1;

			const groups = hit.match.groups ?? {};
			for (const [groupName, value] of Object.entries(groups)) {
				if (value === undefined) continue;
				const varName = hit.pattern.map?.[groupName] ?? groupName;
				working[varName] = valueOf(varName, value);
			}
			for (const action of hit.pattern.actions ?? []) {
				this.applyAction(action, groups, working, records, valueOf, options);
			}

			const t = hit.pattern.transition;
			if (!t || t.to === 'self') continue;
			if (t.to === 'end') break;
			currentStateName = t.to;
		}

		return {
			templateId: template.id,
			templateName: template.name,
			records,
			meta: { linesProcessed, matches, errors: errors.length ? errors : undefined },
			...(options.debug ? { trace } : {}),
		};
	}

	private firstMatch(
		state: CompiledState,
		line: string,
	): { pattern: CompiledPattern; match: RegExpExecArray; index: number } | undefined {
		for (let index = 0; index < state.patterns.length; index += 1) {
			const pattern = state.patterns[index];
			const match = pattern.regex.exec(line);
			if (match) return { pattern, match, index };
		}
		return undefined;
	}

	private applyAction(
		action: Action,
		groups: Record<string, string | undefined>,
		working: ParsedRecord,
		records: ParsedRecord[],
		valueOf: (name: string, raw: string) => unknown,
		options: EngineOptions,
	): void {
		switch (action.type) {
			case 'set': {
				if (!action.variable) return;
				const raw = action.fromGroup ? groups[action.fromGroup] : action.value;
				working[action.variable] = valueOf(action.variable, raw ?? '');
				return;
			}
			case 'clear':
				if (action.variable) delete working[action.variable];
				return;
			case 'append': {
				if (!action.variable) return;
				const raw = action.fromGroup ? groups[action.fromGroup] : action.value;
				const value = valueOf(action.variable, raw ?? '');
				const current = working[action.variable];
				if (Array.isArray(current)) current.push(value);
				else working[action.variable] = current === undefined ? [value] : [current, value];
				return;
			}
			case 'emit':
				records.push({ ...working });
				if (options.resetOnEmit) {
					for (const key of Object.keys(working)) delete working[key];
				}
				return;
		}
	}

	private getOrCompile(template: Template): CompiledTemplate {
		const fromCache = this.compiledCache.get(template.id);
		if (fromCache && fromCache.template === template) return fromCache;

		const states = new Map<string, CompiledState>();
		for (const s of template.states) {
			const compiledPatterns: CompiledPattern[] = s.patterns.map((p) => ({
				regex: new RegExp(p.regex, p.flags),
				map: p.map,
				actions: p.actions,
				transition: p.transition,
			}));
			states.set(s.name, { name: s.name, patterns: compiledPatterns });
		}
		const compiled: CompiledTemplate = {
			template,
			states,
			startState: template.states[0].name,
		};
		this.compiledCache.set(template.id, compiled);
		return compiled;
	}

	private coerceValue(name: string, raw: string, index: Map<string, Variable>): unknown {
		const def = index.get(name);
		if (!def || !def.type) return raw;
		switch (def.type) {
			case 'number': {
				const n = Number(raw);
				return Number.isNaN(n) ? raw : n;
			}
			case 'list':
				return raw
					.split(',')
					.map((s) => s.trim())
					.filter((s) => s.length > 0);
			default:
				return raw;
		}
	}
}
