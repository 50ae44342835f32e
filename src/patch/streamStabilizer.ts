import type { ClassifiedHunk, Hunk, StabilityKey } from '#shared/patch/patch.model';

export function stabilityKey(hunk: Hunk): StabilityKey {
	return [hunk.startLine, hunk.endLine, hunk.oldLines.length, hunk.newLines.length];
}

function keyString(hunk: Hunk): string {
	return stabilityKey(hunk).join(':');
}

export type StabilizerResult = { kind: 'defer' } | { kind: 'classified'; hunks: ClassifiedHunk[] };

/**
 * Tracks the hunks of successive streaming updates of one edit and tells the caller which hunks
 * changed since the last accepted update.
 *
 * Non-final updates are deferred when the streamed line count has not changed, or when less than
 * `debounceMs` has passed since the last accepted update. A final update is never deferred.
 */
export class StreamStabilizer {
	private previous: Hunk[] = [];
	private lastLineCount: number | undefined;
	private lastAcceptedAt: number | undefined;

	constructor(private readonly debounceMs: number) {}

	update(current: Hunk[], lineCount: number, now: number, isFinal: boolean): StabilizerResult {
		if (!isFinal && this.lastAcceptedAt !== undefined && (lineCount === this.lastLineCount || now - this.lastAcceptedAt < this.debounceMs)) {
			return { kind: 'defer' };
		}

		const hunks = StreamStabilizer.classify(this.previous, current);
		this.previous = current;
		this.lastLineCount = lineCount;
		this.lastAcceptedAt = now;
		return { kind: 'classified', hunks };
	}

	/** A current hunk is stable when a previous hunk has the same stability key */
	static classify(previous: readonly Hunk[], current: readonly Hunk[]): ClassifiedHunk[] {
		const seen = new Set(previous.map(keyString));
		return current.map((hunk): ClassifiedHunk => ({ hunk, kind: seen.has(keyString(hunk)) ? 'stable' : 'unstable' }));
	}

	reset(): void {
		this.previous = [];
		this.lastLineCount = undefined;
		this.lastAcceptedAt = undefined;
	}
}
