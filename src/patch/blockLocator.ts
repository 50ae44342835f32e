import { logger } from '#o11y/logger';
import type { EditBlock, FileSnapshot, MatchedBlock } from '#shared/patch/patch.model';
import { LocateError } from './patchErrors';

export interface BlockLocatorOptions {
	/** Fall back to indentation-normalized matching when there is no exact match */
	fuzzyMatch: boolean;
}

/**
 * Finds where a block's search lines occur in a file snapshot.
 *
 * The exact pass compares lines verbatim. The fuzzy pass, only run when the exact pass misses,
 * compares lines with their leading whitespace removed, so a block written at a different
 * indentation level still matches while any difference in content does not. In both passes the
 * first matching window (lowest start line) wins.
 */
export class BlockLocator {
	constructor(private readonly options: BlockLocatorOptions = { fuzzyMatch: true }) {}

	/**
	 * @param fromLine 1-based line the match may start at, at the earliest
	 * @param blockIndex index of the block in its batch, for error reporting
	 * @throws LocateError NotFound when neither pass matches
	 */
	locate(snapshot: FileSnapshot, block: EditBlock, fromLine = 1, blockIndex = 0): MatchedBlock {
		if (block.oldLines.length === 0) throw new Error('BlockLocator requires a non-empty search span');

		const exact = this.findExact(snapshot, block.oldLines, fromLine);
		if (exact !== undefined) return toMatched(block, exact, false);

		if (this.options.fuzzyMatch) {
			const fuzzy = this.findFuzzy(snapshot, block.oldLines, fromLine);
			if (fuzzy !== undefined) {
				logger.debug(`Block ${blockIndex + 1} matched at line ${fuzzy} after indentation normalization`);
				return reindent(snapshot, block, fuzzy);
			}
		}
		throw LocateError.notFound(blockIndex, block.oldLines);
	}

	/**
	 * Locates every non-overlapping exact occurrence of the block, for replace-all edits.
	 * Falls back to the first fuzzy match when there is no exact occurrence.
	 */
	locateAll(snapshot: FileSnapshot, block: EditBlock, blockIndex = 0): MatchedBlock[] {
		if (block.oldLines.length === 0) throw new Error('BlockLocator requires a non-empty search span');

		const matches: MatchedBlock[] = [];
		let from = 1;
		for (;;) {
			const start = this.findExact(snapshot, block.oldLines, from);
			if (start === undefined) break;
			matches.push(toMatched(block, start, false));
			from = start + block.oldLines.length;
		}
		if (matches.length > 0) return matches;
		return [this.locate(snapshot, block, 1, blockIndex)];
	}

	/** @returns the 1-based start line of the first exact match at or after fromLine */
	findExact(snapshot: FileSnapshot, oldLines: readonly string[], fromLine: number): number | undefined {
		return findWindow(snapshot, oldLines, fromLine, (a, b) => a === b);
	}

	/** @returns the 1-based start line of the first indentation-insensitive match at or after fromLine */
	findFuzzy(snapshot: FileSnapshot, oldLines: readonly string[], fromLine: number): number | undefined {
		return findWindow(snapshot, oldLines, fromLine, (a, b) => a.trimStart() === b.trimStart());
	}
}

function findWindow(snapshot: FileSnapshot, oldLines: readonly string[], fromLine: number, equals: (fileLine: string, blockLine: string) => boolean): number | undefined {
	const last = snapshot.length - oldLines.length;
	for (let i = Math.max(0, fromLine - 1); i <= last; i++) {
		let matched = true;
		for (let j = 0; j < oldLines.length; j++) {
			if (!equals(snapshot[i + j], oldLines[j])) {
				matched = false;
				break;
			}
		}
		if (matched) return i + 1;
	}
	return undefined;
}

function toMatched(block: EditBlock, startLine: number, fuzzy: boolean): MatchedBlock {
	return { ...block, startLine, endLine: startLine + block.oldLines.length - 1, fuzzy };
}

function leadingWhitespace(line: string): string {
	return line.slice(0, line.length - line.trimStart().length);
}

/**
 * Rebuilds a fuzzily matched block in the file's own indentation: the search lines become the
 * file's actual lines and the replace lines are shifted by the indentation difference measured
 * on the first non-blank search line.
 */
function reindent(snapshot: FileSnapshot, block: EditBlock, startLine: number): MatchedBlock {
	const fileLines = snapshot.slice(startLine - 1, startLine - 1 + block.oldLines.length);

	const anchor = block.oldLines.findIndex((line) => line.trim() !== '');
	const blockIndent = anchor === -1 ? '' : leadingWhitespace(block.oldLines[anchor]);
	const fileIndent = anchor === -1 ? '' : leadingWhitespace(fileLines[anchor]);

	const newLines = block.newLines.map((line) => {
		if (line.trim() === '') return line;
		if (line.startsWith(blockIndent)) return fileIndent + line.slice(blockIndent.length);
		const extra = fileIndent.length - blockIndent.length;
		if (extra > 0) return fileIndent.slice(0, extra) + line;
		const ownIndent = leadingWhitespace(line);
		return line.slice(Math.min(-extra, ownIndent.length));
	});

	return { ...block, oldLines: fileLines, newLines, startLine, endLine: startLine + fileLines.length - 1, fuzzy: true };
}
