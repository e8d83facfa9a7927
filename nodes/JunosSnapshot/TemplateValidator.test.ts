import path from 'path';
import fs from 'fs-extra';
import { describe, expect, it } from 'vitest';

import { TemplateValidator } from './TemplateValidator';
import type { Template } from './types/template';

const BUNDLED_DIR = path.join(__dirname, 'templates');

function fromJson(value: object): Template {
	return JSON.parse(JSON.stringify(value));
}

const BASE = {
	id: 'custom',
	name: 'Custom',
	parser: 'arp',
	states: [{ name: 'Start', patterns: [{ regex: '^(?<ip_address>\\S+)$', actions: [{ type: 'emit' }] }] }],
};

describe('TemplateValidator', () => {
	it('accepts the bundled templates', async () => {
		const files = (await fs.readdir(BUNDLED_DIR)).filter((file) => file.endsWith('.json'));
		expect(files.length).toBeGreaterThan(0);
		for (const file of files) {
			const template: Template = await fs.readJson(path.join(BUNDLED_DIR, file));
			expect(TemplateValidator.validate(template)).toEqual({ valid: true });
		}
	});

	it('rejects values that are not objects', () => {
		expect(TemplateValidator.validate(JSON.parse('null'))).toEqual({
			valid: false,
			errors: ['Template must be a JSON object'],
		});
	});

	it('requires an id, a name and a known parser kind', () => {
		expect(TemplateValidator.validate(fromJson({ ...BASE, id: '', name: '', parser: 'bogus' }))).toEqual({
			valid: false,
			errors: ['Missing template id', 'Missing template name', 'Unknown parser kind: bogus'],
		});
	});

	it('requires at least one state', () => {
		expect(TemplateValidator.validate(fromJson({ ...BASE, states: [] }))).toEqual({
			valid: false,
			errors: ['Template must define at least one state'],
		});
	});

	it('rejects transitions to undeclared states', () => {
		const template = fromJson({
			...BASE,
			states: [{ name: 'Start', patterns: [{ regex: '^Header', transition: { to: 'Rows' } }] }],
		});
		expect(TemplateValidator.validate(template)).toEqual({
			valid: false,
			errors: ['Transition from Start to unknown state Rows'],
		});
	});

	it('rejects stateful flags', () => {
		const template = fromJson({ ...BASE, states: [{ name: 'Start', patterns: [{ regex: '^x', flags: 'gi' }] }] });
		expect(TemplateValidator.validate(template)).toEqual({
			valid: false,
			errors: ['Stateful regex flags in state Start: gi'],
		});
	});

	it('rejects patterns that do not compile', () => {
		const result = TemplateValidator.validate(
			fromJson({ ...BASE, states: [{ name: 'Start', patterns: [{ regex: '^(unclosed' }] }] }),
		);
		expect(result.valid).toBe(false);
		if (!result.valid) {
			expect(result.errors).toHaveLength(1);
			expect(result.errors[0]).toMatch(/^Invalid regex in state Start: /);
		}
	});
});
