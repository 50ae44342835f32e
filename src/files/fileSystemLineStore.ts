import { access, mkdir, readFile, unlink, writeFile } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import type Pino from 'pino';
import { logger } from '#o11y/logger';
import { FileNotFound, NotAllowed } from '#shared/errors';
import { type LineStore, spliceRange } from './lineStore';

const fs = {
	readFile: promisify(readFile),
	access: promisify(access),
	mkdir: promisify(mkdir),
	writeFile: promisify(writeFile),
	unlink: promisify(unlink),
};

interface FileLines {
	lines: string[];
	trailingNewline: boolean;
	/** Line ending of the first line break, used when writing the file back */
	eol: '\n' | '\r\n';
}

/**
 * Line storage over files on disk. Relative paths resolve against the base path and no path may
 * resolve outside it. A rewritten file keeps its line ending and its trailing newline, or lack of one.
 */
export class FileSystemLineStore implements LineStore {
	private readonly basePath: string;
	log: Pino.Logger;

	constructor(basePath: string = process.cwd()) {
		this.basePath = path.resolve(basePath);
		this.log = logger.child({ store: 'fs', basePath: this.basePath });
	}

	async exists(filePath: string): Promise<boolean> {
		const absolutePath = this.resolvePath(filePath);
		try {
			await fs.access(absolutePath);
			return true;
		} catch (e) {
			this.log.debug({ absolutePath, error: e instanceof Error ? e.message : String(e) }, 'exists check failed');
			return false;
		}
	}

	async readLines(filePath: string): Promise<string[]> {
		return (await this.read(filePath)).lines;
	}

	async replaceRange(filePath: string, startLine: number, endLine: number, lines: readonly string[]): Promise<void> {
		const absolutePath = this.resolvePath(filePath);
		const current: FileLines = (await this.exists(filePath)) ? await this.read(filePath) : { lines: [], trailingNewline: true, eol: '\n' };

		spliceRange(current.lines, startLine, endLine, lines);

		const contents = current.lines.join(current.eol) + (current.trailingNewline && current.lines.length > 0 ? current.eol : '');
		this.log.debug(`Writing ${current.lines.length} line(s) to ${absolutePath}`);
		await fs.mkdir(path.dirname(absolutePath), { recursive: true });
		await fs.writeFile(absolutePath, contents);
	}

	async delete(filePath: string): Promise<void> {
		if (!(await this.exists(filePath))) return;
		const absolutePath = this.resolvePath(filePath);
		this.log.debug(`Deleting ${absolutePath}`);
		await fs.unlink(absolutePath);
	}

	private async read(filePath: string): Promise<FileLines> {
		const absolutePath = this.resolvePath(filePath);
		let contents: string;
		try {
			contents = (await fs.readFile(absolutePath)).toString();
		} catch (e) {
			const code = e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
			throw new FileNotFound(filePath, `(resolved to ${absolutePath}) does not exist or cannot be read`, code);
		}
		if (contents === '') return { lines: [], trailingNewline: false, eol: '\n' };
		const firstBreak = contents.indexOf('\n');
		const eol = firstBreak > 0 && contents[firstBreak - 1] === '\r' ? '\r\n' : '\n';
		const lines = contents.split(/\r?\n/);
		const trailingNewline = lines[lines.length - 1] === '';
		if (trailingNewline) lines.pop();
		return { lines, trailingNewline, eol };
	}

	private resolvePath(filePath: string): string {
		const absolutePath = path.isAbsolute(filePath) ? path.normalize(filePath) : path.resolve(this.basePath, filePath);
		if (absolutePath !== this.basePath && !absolutePath.startsWith(this.basePath + path.sep)) {
			this.log.warn({ absolutePath }, 'Path is outside the base path. Denying access.');
			throw new NotAllowed(filePath, this.basePath);
		}
		return absolutePath;
	}
}
