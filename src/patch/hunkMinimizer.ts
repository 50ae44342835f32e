import { diffArrays } from 'diff';
import type { Hunk, MatchedBlock } from '#shared/patch/patch.model';

/**
 * Reduces a located block to the sub-ranges that actually change.
 *
 * With `minimize` off the whole block becomes one hunk. With it on, the block's search and replace
 * lines are diffed line by line and each run of consecutive insertions/deletions becomes a hunk
 * positioned at the run's offset within the block. A run with no deleted lines is a pure insertion
 * and gets `endLine = startLine - 1`.
 *
 * A partial (still streaming) block only covers as many search lines as it has replace lines; the
 * rest of its span is left alone until a later update extends it.
 *
 * The `newStartLine`/`newEndLine` of the returned hunks are provisional until {@link coordinateOffsets} runs.
 */
export function minimizeBlock(block: MatchedBlock, minimize: boolean): Hunk[] {
	const oldLines = block.isPartial ? block.oldLines.slice(0, block.newLines.length) : block.oldLines;
	const newLines = block.newLines;
	if (oldLines.length === 0 && newLines.length === 0) return [];

	if (!minimize) return [makeHunk(block.startLine, oldLines, newLines)];

	const hunks: Hunk[] = [];
	let oldIndex = 0;
	let run: { offset: number; oldLines: string[]; newLines: string[] } | undefined;

	const flush = () => {
		if (run) hunks.push(makeHunk(block.startLine + run.offset, run.oldLines, run.newLines));
		run = undefined;
	};

	for (const change of diffArrays(oldLines, newLines)) {
		if (!change.added && !change.removed) {
			flush();
			oldIndex += change.value.length;
			continue;
		}
		run ??= { offset: oldIndex, oldLines: [], newLines: [] };
		if (change.removed) {
			run.oldLines.push(...change.value);
			oldIndex += change.value.length;
		} else {
			run.newLines.push(...change.value);
		}
	}
	flush();
	return hunks;
}

function makeHunk(startLine: number, oldLines: string[], newLines: string[]): Hunk {
	return {
		oldLines,
		newLines,
		startLine,
		endLine: startLine + oldLines.length - 1,
		newStartLine: startLine,
		newEndLine: startLine + newLines.length - 1,
	};
}
