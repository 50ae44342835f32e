import { Value } from '@sinclair/typebox/value';
import { FileNotFound } from '#shared/errors';
import type { RangeReplacement } from '#shared/patch/patch.model';
import { RangeReplacementSchema } from '#shared/patch/patch.schema';

/**
 * The storage the patch engine edits: whole-file line reads and line-range replacements.
 * Lines carry no trailing newline.
 */
export interface LineStore {
	exists(path: string): Promise<boolean>;
	/** @throws FileNotFound when the file does not exist */
	readLines(path: string): Promise<string[]>;
	/**
	 * Replaces the 1-based inclusive range with `lines`. `endLine < startLine` inserts before `startLine`.
	 * Replacing into a missing file creates it.
	 */
	replaceRange(path: string, startLine: number, endLine: number, lines: readonly string[]): Promise<void>;
	/** Removes the file. Missing files are ignored. */
	delete(path: string): Promise<void>;
}

/**
 * Executes replacements in order. Every replacement is checked against {@link RangeReplacementSchema}
 * before the first one is written.
 * @throws RangeError when a replacement is malformed
 */
export async function executeReplacements(store: LineStore, replacements: readonly RangeReplacement[]): Promise<void> {
	for (const [index, r] of replacements.entries()) {
		if (Value.Check(RangeReplacementSchema, r)) continue;
		const issues = [...Value.Errors(RangeReplacementSchema, r)].map((error) => `${error.path}: ${error.message}`);
		throw new RangeError(`Invalid replacement ${index + 1}: ${issues.join('; ')}`);
	}
	for (const r of replacements) await store.replaceRange(r.path, r.startLine, r.endLine, r.lines);
}

/** Splices a range replacement into a line buffer in place */
export function spliceRange(buffer: string[], startLine: number, endLine: number, lines: readonly string[]): void {
	if (startLine < 1 || startLine > buffer.length + 1 || endLine < startLine - 1 || endLine > buffer.length) {
		throw new RangeError(`Range ${startLine}-${endLine} is outside a buffer of ${buffer.length} lines`);
	}
	buffer.splice(startLine - 1, endLine - startLine + 1, ...lines);
}

/**
 * Keeps files in memory. Used by tests and by callers embedding the engine over their own buffers.
 */
export class InMemoryLineStore implements LineStore {
	private readonly files = new Map<string, string[]>();

	constructor(files: Record<string, string[]> = {}) {
		for (const [path, lines] of Object.entries(files)) this.files.set(path, [...lines]);
	}

	async exists(path: string): Promise<boolean> {
		return this.files.has(path);
	}

	async readLines(path: string): Promise<string[]> {
		const lines = this.files.get(path);
		if (!lines) throw new FileNotFound(path);
		return [...lines];
	}

	async replaceRange(path: string, startLine: number, endLine: number, lines: readonly string[]): Promise<void> {
		const buffer = this.files.get(path) ?? [];
		spliceRange(buffer, startLine, endLine, lines);
		this.files.set(path, buffer);
	}

	async delete(path: string): Promise<void> {
		this.files.delete(path);
	}

	/** Current contents of a file, undefined when it does not exist */
	snapshot(path: string): string[] | undefined {
		const lines = this.files.get(path);
		return lines ? [...lines] : undefined;
	}
}
