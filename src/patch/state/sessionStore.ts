import { randomUUID } from 'node:crypto';
import { logger } from '#o11y/logger';
import type { Hunk } from '#shared/patch/patch.model';
import { SessionNotFoundError } from '../patchErrors';
import { ApplySession } from './applySession';

/**
 * In-flight apply sessions, keyed by session id. A session lives from the start of its edit
 * operation until it is finalized or cancelled.
 */
export class SessionStore {
	private readonly sessions = new Map<string, ApplySession>();

	create(path: string, originalLines: readonly string[], hunks: readonly Hunk[]): ApplySession {
		const session = new ApplySession(randomUUID(), path, originalLines, hunks);
		this.sessions.set(session.id, session);
		logger.info(`Session ${session.id} created for ${path} with ${hunks.length} hunk(s)`);
		return session;
	}

	/** @throws SessionNotFoundError */
	get(id: string): ApplySession {
		const session = this.sessions.get(id);
		if (!session) throw new SessionNotFoundError(id);
		return session;
	}

	has(id: string): boolean {
		return this.sessions.has(id);
	}

	/**
	 * Finalizes the session and removes it. The session stays registered when finalizing fails.
	 */
	finalize(id: string): string[] {
		const lines = this.get(id).finalize();
		this.sessions.delete(id);
		logger.info(`Session ${id} finalized`);
		return lines;
	}

	/** Cancels and removes the session. Unknown ids are ignored. */
	cancel(id: string): void {
		const session = this.sessions.get(id);
		if (!session) return;
		session.cancel();
		this.sessions.delete(id);
		logger.info(`Session ${id} cancelled`);
	}

	get size(): number {
		return this.sessions.size;
	}
}
