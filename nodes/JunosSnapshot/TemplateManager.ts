import path from 'path';
import fs from 'fs-extra';

import { LoggingUtils, type SnapshotLogger } from '../../utils/LoggingUtils';
import type { ParserKind } from './types/records';
import type { Template } from './types/template';
import { TemplateValidator } from './TemplateValidator';

export function defaultStorageDir(): string {
	const base = process.env.N8N_USER_FOLDER || process.env.HOME || process.cwd();
	return path.join(base, '.n8n', 'junos-snapshot');
}

/**
 * File-backed template store. Bundled templates are copied into the store on
 * first use and never overwrite a file already there, so local edits stick.
 */
export class TemplateManager {
	private storageDir: string;
	private logger: SnapshotLogger;

	constructor(storageDir?: string, logger: SnapshotLogger = LoggingUtils.console(false)) {
		this.storageDir = storageDir || defaultStorageDir();
		this.logger = logger;
	}

	private get templatesDir(): string {
		return path.join(this.storageDir, 'templates');
	}

	async init(): Promise<void> {
		await fs.ensureDir(this.templatesDir);
		await this.seedBundledTemplates();
	}

	private async seedBundledTemplates(): Promise<void> {
		const bundledDir = path.join(__dirname, 'templates');
		if (!(await fs.pathExists(bundledDir))) return;
		const files = (await fs.readdir(bundledDir)).filter((f: string) => f.endsWith('.json'));
		for (const file of files) {
			const template = await this.readTemplate(path.join(bundledDir, file));
			if (!template) continue;
			const target = this.templatePath(template.id);
			if (!(await fs.pathExists(target))) {
				await fs.writeJson(target, template, { spaces: 2 });
				this.logger.debug(`Seeded template ${template.id}`);
			}
		}
	}

	private templatePath(id: string): string {
		return path.join(this.templatesDir, `${id}.json`);
	}

	/** Unreadable or invalid files are reported and skipped. */
	private async readTemplate(file: string): Promise<Template | undefined> {
		let template: Template;
		try {
			template = await fs.readJson(file);
		} catch (e) {
			this.logger.warn(`Skipping unreadable template ${file}: ${e instanceof Error ? e.message : String(e)}`);
			return undefined;
		}
		const validation = TemplateValidator.validate(template);
		if (!validation.valid) {
			this.logger.warn(`Skipping invalid template ${file}: ${validation.errors.join('; ')}`);
			return undefined;
		}
		return template;
	}

	async list(): Promise<Template[]> {
		await this.init();
		const files = (await fs.readdir(this.templatesDir)).filter((f: string) => f.endsWith('.json')).sort();
		const templates: Template[] = [];
		for (const f of files) {
			const template = await this.readTemplate(path.join(this.templatesDir, f));
			if (template) templates.push(template);
		}
		return templates;
	}

	async get(id: string): Promise<Template | undefined> {
		await this.init();
		const file = this.templatePath(id);
		if (!(await fs.pathExists(file))) return undefined;
		return this.readTemplate(file);
	}

	/** One template per parser kind; the first by file name wins. */
	async byParser(): Promise<Map<ParserKind, Template>> {
		const index = new Map<ParserKind, Template>();
		for (const template of await this.list()) {
			if (!index.has(template.parser)) index.set(template.parser, template);
		}
		return index;
	}
}
