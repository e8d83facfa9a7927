import { PARSERS } from './parsers';
import type { Template } from './types/template';

export class TemplateValidator {
	static validate(template: Template): { valid: true } | { valid: false; errors: string[] } {
		if (typeof template !== 'object' || template === null) {
			return { valid: false, errors: ['Template must be a JSON object'] };
		}
		const errors: string[] = [];

		if (!template.id) errors.push('Missing template id');
		if (!template.name) errors.push('Missing template name');
		if (!template.parser || !Object.prototype.hasOwnProperty.call(PARSERS, template.parser)) {
			errors.push(`Unknown parser kind: ${String(template.parser)}`);
		}
		if (!Array.isArray(template.states) || template.states.length === 0) {
			errors.push('Template must define at least one state');
			return { valid: false, errors };
		}

		const stateNames = new Set(template.states.map((s) => s.name));
		for (const state of template.states) {
			if (!state.name) errors.push('State without a name');
			if (!Array.isArray(state.patterns) || state.patterns.length === 0) {
				errors.push(`State ${state.name} has no patterns`);
				continue;
			}
			for (const p of state.patterns) {
				if (p.flags && /[gy]/.test(p.flags)) {
					errors.push(`Stateful regex flags in state ${state.name}: ${p.flags}`);
				}
				try {
					new RegExp(p.regex, p.flags);
				} catch (e) {
					errors.push(`Invalid regex in state ${state.name}: ${e instanceof Error ? e.message : String(e)}`);
				}
				if (p.transition?.to && p.transition.to !== 'self' && p.transition.to !== 'end') {
					if (!stateNames.has(p.transition.to)) {
						errors.push(`Transition from ${state.name} to unknown state ${p.transition.to}`);
					}
				}
			}
		}

		if (errors.length > 0) return { valid: false, errors };
		return { valid: true };
	}
}
