import { logger } from '#o11y/logger';
import type { EditBlock, FileSnapshot, Hunk, MatchedBlock } from '#shared/patch/patch.model';
import { BlockLocator } from './blockLocator';
import { minimizeBlock } from './hunkMinimizer';
import { coordinateOffsets } from './offsetCoordinator';
import { LocateError } from './patchErrors';

export interface PlanOptions {
	minimizeDiff: boolean;
	fuzzyMatch: boolean;
	/** Match every occurrence of the single block instead of the first */
	replaceAll?: boolean;
}

/**
 * Locates blocks in document order: each block's search starts strictly after the start line of
 * the previous block's match. Blocks with no search lines are placed at their anchor line, or
 * appended when they have none.
 *
 * @throws LocateError NotFound for the first block that cannot be placed
 */
export function locateBlocks(snapshot: FileSnapshot, blocks: readonly EditBlock[], locator: BlockLocator, replaceAll = false): MatchedBlock[] {
	const matched: MatchedBlock[] = [];
	let previousStart = 0;

	blocks.forEach((block, index) => {
		if (block.oldLines.length === 0) {
			const anchor = block.anchorLine ?? snapshot.length + 1;
			if (!Number.isInteger(anchor) || anchor < 1 || anchor > snapshot.length + 1) {
				throw new LocateError('NotFound', `Insert position ${anchor - 1} is outside the file (${snapshot.length} lines)`, index, block.oldLines);
			}
			matched.push({ ...block, startLine: anchor, endLine: anchor - 1, fuzzy: false });
			return;
		}

		if (replaceAll) {
			matched.push(...locator.locateAll(snapshot, block, index));
			return;
		}

		const match = locator.locate(snapshot, block, previousStart + 1, index);
		matched.push(match);
		previousStart = match.startLine;
	});
	return matched;
}

/**
 * Runs the whole pipeline for one file: locate, minimize, sort, check for overlap, coordinate offsets.
 *
 * @throws LocateError NotFound when a block cannot be located, Overlap when two blocks claim the same lines
 */
export function planHunks(snapshot: FileSnapshot, blocks: readonly EditBlock[], options: PlanOptions): Hunk[] {
	const locator = new BlockLocator({ fuzzyMatch: options.fuzzyMatch });
	const matched = locateBlocks(snapshot, blocks, locator, options.replaceAll);

	const tagged = matched.flatMap((block, blockIndex) => minimizeBlock(block, options.minimizeDiff).map((hunk) => ({ hunk, blockIndex })));
	// Array.prototype.sort is stable; a pure insertion goes before a replacement starting on the same line
	tagged.sort((a, b) => a.hunk.startLine - b.hunk.startLine || Number(isReplacement(a.hunk)) - Number(isReplacement(b.hunk)));

	for (let i = 1; i < tagged.length; i++) {
		const previous = tagged[i - 1].hunk;
		const current = tagged[i].hunk;
		if (current.startLine <= previous.endLine) {
			const block = matched[tagged[i].blockIndex];
			throw new LocateError(
				'Overlap',
				`Block ${tagged[i].blockIndex + 1} overlaps lines ${previous.startLine}-${previous.endLine} changed by an earlier block`,
				tagged[i].blockIndex,
				block.oldLines,
			);
		}
	}

	const hunks = coordinateOffsets(tagged.map((t) => t.hunk));
	logger.debug(`Planned ${hunks.length} hunk(s) from ${blocks.length} block(s)`);
	return hunks;
}

function isReplacement(hunk: Hunk): boolean {
	return hunk.oldLines.length > 0;
}

/**
 * Builds the post-apply buffer. Hunks must be sorted and non-overlapping, in the coordinates of `lines`.
 */
export function applyHunks(lines: readonly string[], hunks: readonly Hunk[]): string[] {
	const result: string[] = [];
	let cursor = 0;
	for (const hunk of hunks) {
		const start = hunk.startLine - 1;
		result.push(...lines.slice(cursor, start), ...hunk.newLines);
		cursor = start + hunk.oldLines.length;
	}
	result.push(...lines.slice(cursor));
	return result;
}
