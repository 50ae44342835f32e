import type { TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { EngineConfig } from '#config/engineConfig';
import { type LineStore, executeReplacements } from '#files/lineStore';
import { logger } from '#o11y/logger';
import type { Hunk } from '#shared/patch/patch.model';
import {
	type CreateInput,
	CreateInputSchema,
	type InsertInput,
	InsertInputSchema,
	type ReplaceInFileInput,
	ReplaceInFileInputSchema,
	type StrReplaceInput,
	StrReplaceInputSchema,
} from '#shared/patch/patch.schema';
import { type EditSource, resolveEditSource } from './editSource';
import { planHunks } from './hunkPlanner';
import { errorReason } from './patchErrors';
import type { ApplySession } from './state/applySession';
import type { SessionStore } from './state/sessionStore';
import { type RenderHunk, StreamingEdit } from './streamingEdit';

export interface EditOperationDeps {
	store: LineStore;
	sessions: SessionStore;
	config: EngineConfig;
	/** Asks the user whether to keep the proposed changes */
	requestConfirmation: (message: string) => Promise<boolean>;
	renderHunk?: RenderHunk;
}

export type EditResult = { success: true; lines: string[] } | { success: false; error: string };

export const USER_DECLINED = 'User declined';

/**
 * Runs edit operations against a line store: read the file once, plan the hunks, write them as a
 * proposal, then keep them on confirmation or restore the file when declined.
 *
 * Every failure is returned as a reason string. A failed operation leaves no session behind.
 */
export class EditOperation {
	constructor(private readonly deps: EditOperationDeps) {}

	async replaceInFile(input: ReplaceInFileInput): Promise<EditResult> {
		const invalid = validate(ReplaceInFileInputSchema, input);
		if (invalid) return invalid;
		return this.apply(input.path, { kind: 'searchReplace', markup: input.diff, isFinal: true });
	}

	async strReplace(input: StrReplaceInput): Promise<EditResult> {
		const invalid = validate(StrReplaceInputSchema, input);
		if (invalid) return invalid;
		return this.apply(input.path, { kind: 'strReplace', oldStr: input.oldStr, newStr: input.newStr, replaceAll: input.replaceAll, isFinal: true });
	}

	async insert(input: InsertInput): Promise<EditResult> {
		const invalid = validate(InsertInputSchema, input);
		if (invalid) return invalid;
		return this.apply(input.path, { kind: 'insert', insertLine: input.insertLine, newStr: input.newStr });
	}

	async create(input: CreateInput): Promise<EditResult> {
		const invalid = validate(CreateInputSchema, input);
		if (invalid) return invalid;
		return this.apply(input.path, { kind: 'create', fileText: input.fileText });
	}

	/** Plans the hunks of an edit without writing anything */
	async plan(path: string, source: EditSource): Promise<Hunk[]> {
		const snapshot = await this.readSnapshot(path, source);
		const { blocks, replaceAll } = resolveEditSource(source);
		return planHunks(snapshot, blocks, { minimizeDiff: this.deps.config.minimizeDiff, fuzzyMatch: this.deps.config.fuzzyMatch, replaceAll });
	}

	async apply(path: string, source: EditSource): Promise<EditResult> {
		let session: ApplySession | undefined;
		try {
			const snapshot = await this.readSnapshot(path, source);
			const { blocks, replaceAll } = resolveEditSource(source);
			const hunks = planHunks(snapshot, blocks, { minimizeDiff: this.deps.config.minimizeDiff, fuzzyMatch: this.deps.config.fuzzyMatch, replaceAll });
			session = this.deps.sessions.create(path, snapshot, hunks);
			if (this.deps.renderHunk) {
				for (const hunk of session.hunks) this.deps.renderHunk(hunk, 'unstable');
			}
			return await this.resolve(session, source.kind === 'create');
		} catch (e) {
			return this.fail(path, e, session);
		}
	}

	/**
	 * Starts a streamed edit against the current contents of the file. Feed it updates, then pass it to
	 * {@link completeStream} once it has received its final update.
	 */
	async openStream(path: string): Promise<StreamingEdit> {
		const snapshot = await this.deps.store.readLines(path);
		return new StreamingEdit(path, snapshot, this.deps.config, this.deps.renderHunk);
	}

	async completeStream(edit: StreamingEdit): Promise<EditResult> {
		let session: ApplySession | undefined;
		try {
			session = edit.toSession(this.deps.sessions);
			return await this.resolve(session, false);
		} catch (e) {
			return this.fail(edit.path, e, session);
		}
	}

	private async readSnapshot(path: string, source: EditSource): Promise<string[]> {
		const exists = await this.deps.store.exists(path);
		if (source.kind === 'create') {
			if (exists) throw new Error(`File already exists: ${path}`);
			return [];
		}
		if (!exists) throw new Error(`File not found: ${path}`);
		return this.deps.store.readLines(path);
	}

	/**
	 * Writes the proposal and keeps it or restores the file. Any failure once writing has started
	 * restores the file before it propagates.
	 * @param created the file did not exist before this edit, and restoring it means removing it
	 */
	private async resolve(session: ApplySession, created: boolean): Promise<EditResult> {
		const { store, sessions, config } = this.deps;
		const hunkCount = session.hunks.length;

		try {
			await executeReplacements(store, session.commitAll());

			const accepted = hunkCount === 0 || config.autoApprove || (await this.deps.requestConfirmation(`Apply ${hunkCount} change(s) to ${session.path}?`));
			if (!accepted) {
				const restore = session.rejectAll();
				if (created) await store.delete(session.path);
				else await executeReplacements(store, restore);
				sessions.finalize(session.id);
				logger.info(`Edit of ${session.path} declined, file restored`);
				return { success: false, error: USER_DECLINED };
			}

			// An empty created file has no hunk to write it
			if (created && hunkCount === 0) await store.replaceRange(session.path, 1, 0, []);
		} catch (e) {
			await this.restore(session, created).catch((restoreError: unknown) => logger.error({ err: restoreError }, `Could not restore ${session.path}`));
			throw e;
		}

		const lines = sessions.finalize(session.id);
		logger.info(`Applied ${hunkCount} hunk(s) to ${session.path}`);
		return { success: true, lines };
	}

	/** Puts the file back to the snapshot the session was planned against, whatever was written so far */
	private async restore(session: ApplySession, created: boolean): Promise<void> {
		const { store } = this.deps;
		if (created) {
			await store.delete(session.path);
		} else {
			const current = await store.readLines(session.path);
			await store.replaceRange(session.path, 1, current.length, session.originalLines);
		}
		logger.info(`Restored ${session.path} after a failed edit`);
	}

	private fail(path: string, e: unknown, session: ApplySession | undefined): EditResult {
		if (session) this.deps.sessions.cancel(session.id);
		const error = errorReason(e);
		logger.warn(`Edit of ${path} failed: ${error}`);
		return { success: false, error };
	}
}

function validate(schema: TSchema, input: unknown): EditResult | undefined {
	if (Value.Check(schema, input)) return undefined;
	const issues = [...Value.Errors(schema, input)].map((error) => `${error.path}: ${error.message}`);
	return { success: false, error: `Invalid input: ${issues.join('; ')}` };
}
