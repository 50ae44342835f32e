import type { Hunk } from '#shared/patch/patch.model';

/**
 * Computes every hunk's position in the post-apply file: its original start line shifted by the
 * net line-count change of all earlier applied hunks.
 *
 * Always recomputed from `startLine` and the current line counts, never patched incrementally, so
 * running it again on the same hunks gives the same result. Hunks must be sorted by `startLine`.
 *
 * @param isApplied whether the hunk at an index is applied. A hunk that is not (a rejected one)
 *   keeps its old lines, contributes no shift, and spans its old lines in the post-apply file.
 */
export function coordinateOffsets(hunks: readonly Hunk[], isApplied: (index: number) => boolean = () => true): Hunk[] {
	let delta = 0;
	return hunks.map((hunk, index) => {
		const newStartLine = hunk.startLine + delta;
		if (!isApplied(index)) return { ...hunk, newStartLine, newEndLine: newStartLine + hunk.oldLines.length - 1 };

		delta += hunk.newLines.length - hunk.oldLines.length;
		return { ...hunk, newStartLine, newEndLine: newStartLine + hunk.newLines.length - 1 };
	});
}

/** Net line-count change of the applied hunks */
export function totalDelta(hunks: readonly Hunk[], isApplied: (index: number) => boolean = () => true): number {
	return hunks.reduce((sum, hunk, index) => (isApplied(index) ? sum + hunk.newLines.length - hunk.oldLines.length : sum), 0);
}
