import type { ParserKind } from './records';

/** How a captured string is coerced when the engine runs with `coerceTypes`. */
export type VariableType = 'string' | 'number' | 'list';

export interface Variable {
	name: string;
	description?: string;
	type?: VariableType;
}

export interface Transition {
	to: string; // state name, 'self', or 'end'
}

export type ActionType = 'emit' | 'set' | 'clear' | 'append';

export interface Action {
	type: ActionType;
	variable?: string;
	// 'set'/'append' take the named group when given, else the constant
	fromGroup?: string;
	value?: string;
}

export interface StatePattern {
	// named groups are copied into the working record
	regex: string;
	// group name -> record field, where they differ
	map?: Record<string, string>;
	flags?: string;
	actions?: Action[];
	transition?: Transition;
}

export interface State {
	name: string;
	patterns: StatePattern[];
}

/**
 * A stored parsing template. The first state is the start state; `parser`
 * names the record collection its output converts into.
 */
export interface Template {
	id: string;
	name: string;
	description?: string;
	parser: ParserKind;
	/** Command whose output the template reads, for display only. */
	command?: string;
	variables?: Variable[];
	states: State[];
	metadata?: { created: string; updated: string; version?: string };
}

export type ParsedRecord = Record<string, unknown>;

export interface ParsedResult {
	templateId: string;
	templateName: string;
	records: ParsedRecord[];
	meta: {
		linesProcessed: number;
		matches: number;
		errors?: string[];
	};
}

export interface CompiledPattern {
	regex: RegExp;
	map?: Record<string, string>;
	actions?: Action[];
	transition?: Transition;
}

export interface CompiledState {
	name: string;
	patterns: CompiledPattern[];
}

export interface CompiledTemplate {
	template: Template;
	states: Map<string, CompiledState>;
	startState: string;
}
