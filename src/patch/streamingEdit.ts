import { logger } from '#o11y/logger';
import type { EngineConfig } from '#config/engineConfig';
import type { ClassifiedHunk, FileSnapshot, Hunk, HunkKind } from '#shared/patch/patch.model';
import { type EditSource, isFinalSource, resolveEditSource } from './editSource';
import { planHunks } from './hunkPlanner';
import { LocateError } from './patchErrors';
import type { ApplySession } from './state/applySession';
import type { SessionStore } from './state/sessionStore';
import { StreamStabilizer } from './streamStabilizer';

/** Display notification for a hunk of an accepted update. Advisory only. */
export type RenderHunk = (hunk: Hunk, kind: HunkKind) => void;

export type StreamingUpdate = { kind: 'deferred' } | { kind: 'updated'; hunks: ClassifiedHunk[] };

/**
 * Drives one edit whose markup arrives incrementally. Every update re-parses and re-plans the whole
 * text against the snapshot taken when the edit started, and reports which hunks changed since the
 * last accepted update.
 *
 * Updates must be fed one at a time; the caller serializes them.
 */
export class StreamingEdit {
	readonly snapshot: FileSnapshot;
	private readonly stabilizer: StreamStabilizer;
	private finalHunks: Hunk[] | undefined;

	constructor(
		readonly path: string,
		snapshot: FileSnapshot,
		private readonly config: EngineConfig,
		private readonly renderHunk?: RenderHunk,
	) {
		this.snapshot = Object.freeze([...snapshot]);
		this.stabilizer = new StreamStabilizer(config.streamDebounceMs);
	}

	get isComplete(): boolean {
		return this.finalHunks !== undefined;
	}

	/**
	 * @param now timestamp of the update, in milliseconds
	 * @throws ParseError or LocateError on a final update that cannot be planned
	 */
	update(source: EditSource, now: number = Date.now()): StreamingUpdate {
		if (this.finalHunks) throw new Error(`Streaming edit of ${this.path} already received its final update`);
		const isFinal = isFinalSource(source);

		const { blocks, replaceAll } = resolveEditSource(source);
		const lineCount = blocks.reduce((sum, block) => sum + block.oldLines.length + block.newLines.length, 0);

		let hunks: Hunk[];
		try {
			hunks = planHunks(this.snapshot, blocks, { minimizeDiff: this.config.minimizeDiff, fuzzyMatch: this.config.fuzzyMatch, replaceAll });
		} catch (e) {
			// A block that does not locate yet may still be completed by later tokens
			if (isFinal || !(e instanceof LocateError)) throw e;
			logger.debug(`Deferring streaming update of ${this.path}: ${e.message}`);
			return { kind: 'deferred' };
		}

		const result = this.stabilizer.update(hunks, lineCount, now, isFinal);
		if (result.kind === 'defer') return { kind: 'deferred' };

		if (isFinal) this.finalHunks = hunks;
		if (this.renderHunk) {
			for (const { hunk, kind } of result.hunks) this.renderHunk(hunk, kind);
		}
		return { kind: 'updated', hunks: result.hunks };
	}

	/** Registers an apply session for the final hunk set */
	toSession(store: SessionStore): ApplySession {
		if (!this.finalHunks) throw new Error(`Streaming edit of ${this.path} has not received its final update`);
		return store.create(this.path, this.snapshot, this.finalHunks);
	}
}
