/**
 * Typed failures of the patch engine. Every error carries a `code` so callers can
 * report it without parsing the message.
 */

export class ParseError extends Error {
	readonly code = 'NoBlocksFound';

	constructor(message = 'No SEARCH/REPLACE blocks found') {
		super(message);
		this.name = 'ParseError';
		Object.setPrototypeOf(this, ParseError.prototype);
	}
}

export type LocateErrorCode = 'NotFound' | 'Overlap';

export class LocateError extends Error {
	constructor(
		public readonly code: LocateErrorCode,
		message: string,
		/** 0-based index of the block within its batch */
		public readonly blockIndex: number,
		public readonly searchLines: readonly string[],
	) {
		super(message);
		this.name = 'LocateError';
		Object.setPrototypeOf(this, LocateError.prototype);
	}

	static notFound(blockIndex: number, searchLines: readonly string[]): LocateError {
		return new LocateError('NotFound', `Failed to find the old string of block ${blockIndex + 1}:\n${searchLines.join('\n')}`, blockIndex, searchLines);
	}
}

export class IncompleteSessionError extends Error {
	readonly code = 'IncompleteSession';

	constructor(public readonly pendingHunks: number[]) {
		super(`Cannot finalize: ${pendingHunks.length} hunk(s) still pending (${pendingHunks.join(', ')})`);
		this.name = 'IncompleteSessionError';
		Object.setPrototypeOf(this, IncompleteSessionError.prototype);
	}
}

export type HunkStateErrorCode = 'InvalidTransition' | 'UnknownHunk';

export class HunkStateError extends Error {
	constructor(
		public readonly code: HunkStateErrorCode,
		message: string,
		public readonly hunkIndex: number,
	) {
		super(message);
		this.name = 'HunkStateError';
		Object.setPrototypeOf(this, HunkStateError.prototype);
	}
}

export class SessionClosedError extends Error {
	readonly code = 'SessionClosed';

	constructor(public readonly sessionId: string) {
		super(`Session ${sessionId} is closed`);
		this.name = 'SessionClosedError';
		Object.setPrototypeOf(this, SessionClosedError.prototype);
	}
}

export class SessionNotFoundError extends Error {
	readonly code = 'SessionNotFound';

	constructor(public readonly sessionId: string) {
		super(`No session with id ${sessionId}`);
		this.name = 'SessionNotFoundError';
		Object.setPrototypeOf(this, SessionNotFoundError.prototype);
	}
}

export class ConfigError extends Error {
	readonly code = 'InvalidConfig';

	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

export type PatchError = ParseError | LocateError | IncompleteSessionError | HunkStateError | SessionClosedError | SessionNotFoundError | ConfigError;

export function isPatchError(e: unknown): e is PatchError {
	return (
		e instanceof ParseError ||
		e instanceof LocateError ||
		e instanceof IncompleteSessionError ||
		e instanceof HunkStateError ||
		e instanceof SessionClosedError ||
		e instanceof SessionNotFoundError ||
		e instanceof ConfigError
	);
}

/**
 * Renders a failure as the reason string handed back to the invoking agent or user.
 */
export function errorReason(e: unknown): string {
	if (isPatchError(e)) return `${e.code}: ${e.message}`;
	if (e instanceof Error) return e.message;
	return String(e);
}
