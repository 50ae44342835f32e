import { logger } from '#o11y/logger';
import type { Hunk, HunkStatus, RangeReplacement, SessionStatus } from '#shared/patch/patch.model';
import { applyHunks } from '../hunkPlanner';
import { coordinateOffsets, totalDelta } from '../offsetCoordinator';
import { HunkStateError, IncompleteSessionError, SessionClosedError } from '../patchErrors';

interface SessionState {
	/** Per-hunk resolution, indexed like the hunks */
	statuses: HunkStatus[];
	/** Set once any hunk has been committed or rejected */
	touched: boolean;
	closed: boolean;
}

/**
 * Hunk-level accept/reject over one file edit.
 *
 * The session never touches storage itself. Every mutating call returns the range replacements the
 * caller must execute, in the coordinates of the caller's storage as it stands after all previously
 * returned replacements were executed: a hunk's current start is its original start plus the net
 * change of the committed hunks before it.
 */
export class ApplySession {
	readonly originalLines: readonly string[];
	private readonly baseHunks: readonly Hunk[];
	private _state: SessionState;

	/**
	 * @param hunks sorted, non-overlapping hunks in the coordinates of `originalLines`
	 */
	constructor(
		public readonly id: string,
		public readonly path: string,
		originalLines: readonly string[],
		hunks: readonly Hunk[],
	) {
		this.originalLines = Object.freeze([...originalLines]);
		this.baseHunks = Object.freeze([...hunks]);
		this._state = { statuses: hunks.map((): HunkStatus => 'pending'), touched: false, closed: false };
	}

	get status(): SessionStatus {
		if (this._state.closed) return 'closed';
		return this._state.touched ? 'resolving' : 'open';
	}

	/** Hunks with post-apply positions, rejected hunks counted as not applied */
	get hunks(): Hunk[] {
		return coordinateOffsets(this.baseHunks, (index) => this._state.statuses[index] !== 'rejected');
	}

	get hunkStatuses(): readonly HunkStatus[] {
		return [...this._state.statuses];
	}

	/** Net line-count change currently written to storage */
	get cumulativeOffset(): number {
		return totalDelta(this.baseHunks, (index) => this._state.statuses[index] === 'committed');
	}

	get rejected(): ReadonlySet<number> {
		return new Set(this.indicesWithStatus('rejected'));
	}

	get pending(): number[] {
		return this.indicesWithStatus('pending');
	}

	/**
	 * Accepts a hunk. Committing an already committed hunk is a no-op.
	 * @throws HunkStateError InvalidTransition for a rejected hunk
	 */
	commit(index: number): RangeReplacement[] {
		const status = this.statusOf(index);
		if (status === 'committed') return [];
		if (status === 'rejected') throw new HunkStateError('InvalidTransition', `Hunk ${index} was rejected and cannot be committed`, index);

		const hunk = this.baseHunks[index];
		const startLine = this.currentStart(index);
		this.resolve(index, 'committed');
		return [{ path: this.path, startLine, endLine: startLine + hunk.oldLines.length - 1, lines: [...hunk.newLines] }];
	}

	/**
	 * Rejects a hunk. A committed hunk has its original lines written back.
	 * Rejecting an already rejected hunk is a no-op.
	 */
	reject(index: number): RangeReplacement[] {
		const status = this.statusOf(index);
		if (status === 'rejected') return [];

		const hunk = this.baseHunks[index];
		const startLine = this.currentStart(index);
		this.resolve(index, 'rejected');
		if (status === 'pending') return [];
		return [{ path: this.path, startLine, endLine: startLine + hunk.newLines.length - 1, lines: [...hunk.oldLines] }];
	}

	commitAll(): RangeReplacement[] {
		this.assertOpen();
		return this.baseHunks.flatMap((_, index) => (this._state.statuses[index] === 'pending' ? this.commit(index) : []));
	}

	rejectAll(): RangeReplacement[] {
		this.assertOpen();
		return this.baseHunks.flatMap((_, index) => this.reject(index));
	}

	/**
	 * Closes the session and returns the resulting file: the original lines with the committed hunks applied.
	 * @throws IncompleteSessionError while any hunk is pending
	 */
	finalize(): string[] {
		this.assertOpen();
		const pending = this.pending;
		if (pending.length > 0) throw new IncompleteSessionError(pending);

		const committed = this.baseHunks.filter((_, index) => this._state.statuses[index] === 'committed');
		this._state.closed = true;
		logger.debug(`Session ${this.id} finalized: ${committed.length} of ${this.baseHunks.length} hunk(s) committed`);
		return applyHunks(this.originalLines, committed);
	}

	/** Closes the session without producing a result. Replacements already returned stay the caller's. */
	cancel(): void {
		this._state.closed = true;
	}

	/** The pending hunk whose current span contains `line`, a pure insertion matching on its start line */
	hunkAt(line: number): number | undefined {
		return this.pending.find((index) => {
			const { start, end } = this.currentSpan(index);
			return line >= start && line <= Math.max(start, end);
		});
	}

	/** The first pending hunk starting after `line`, wrapping to the first one */
	nextHunk(line: number): number | undefined {
		const pending = this.pending;
		return pending.find((index) => this.currentStart(index) > line) ?? pending[0];
	}

	/** The last pending hunk starting before `line`, wrapping to the last one */
	prevHunk(line: number): number | undefined {
		const pending = this.pending;
		const before = pending.filter((index) => this.currentStart(index) < line);
		return before.length > 0 ? before[before.length - 1] : pending[pending.length - 1];
	}

	private currentStart(index: number): number {
		let delta = 0;
		for (let i = 0; i < index; i++) {
			if (this._state.statuses[i] === 'committed') delta += this.baseHunks[i].newLines.length - this.baseHunks[i].oldLines.length;
		}
		return this.baseHunks[index].startLine + delta;
	}

	private currentSpan(index: number): { start: number; end: number } {
		const start = this.currentStart(index);
		const hunk = this.baseHunks[index];
		const length = this._state.statuses[index] === 'committed' ? hunk.newLines.length : hunk.oldLines.length;
		return { start, end: start + length - 1 };
	}

	private statusOf(index: number): HunkStatus {
		this.assertOpen();
		const status = this._state.statuses[index];
		if (!Number.isInteger(index) || status === undefined) throw new HunkStateError('UnknownHunk', `No hunk ${index} in session ${this.id}`, index);
		return status;
	}

	private resolve(index: number, status: HunkStatus): void {
		this._state.statuses[index] = status;
		this._state.touched = true;
	}

	private indicesWithStatus(status: HunkStatus): number[] {
		return this._state.statuses.flatMap((s, index) => (s === status ? [index] : []));
	}

	private assertOpen(): void {
		if (this._state.closed) throw new SessionClosedError(this.id);
	}
}
