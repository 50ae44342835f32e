import type { EngineConfig } from '#config/engineConfig';
import type { LineStore } from '#files/lineStore';
import { EditOperation } from '#patch/editOperation';
import type { EditSource } from '#patch/editSource';
import { errorReason } from '#patch/patchErrors';
import { SessionStore } from '#patch/state/sessionStore';
import { looksLikeUnifiedDiff } from '#patch/unifiedDiff';
import type { Hunk } from '#shared/patch/patch.model';
import { type CliOptions, parseUserCliArgs } from './cli';

export const USAGE = 'Usage: hunkwise <file> <markup-file> [--yes] [--no-minimize] [--dry-run]';

const BOOLEAN_FLAGS = ['yes', 'y', 'no-minimize', 'dry-run', 'help', 'h'];

export interface PatchCommandDeps {
	store: LineStore;
	config: EngineConfig;
	readText: (path: string) => string;
	requestConfirmation: (message: string) => Promise<boolean>;
	print: (text: string) => void;
}

/**
 * Applies the SEARCH/REPLACE markup (or unified diff) in a file to a target file.
 * @returns the process exit code
 */
export async function runPatchCommand(args: readonly string[], deps: PatchCommandDeps): Promise<number> {
	let options: CliOptions;
	try {
		options = parseUserCliArgs('hunkwise', args, BOOLEAN_FLAGS);
	} catch (e) {
		deps.print(`${errorReason(e)}\n${USAGE}`);
		return 2;
	}
	const { flags, positional } = options;
	if (flags.help || flags.h) {
		deps.print(USAGE);
		return 0;
	}
	if (positional.length !== 2) {
		deps.print(`Expected 2 arguments, got ${positional.length}\n${USAGE}`);
		return 2;
	}
	const [target, markupPath] = positional;

	const config: EngineConfig = {
		...deps.config,
		minimizeDiff: deps.config.minimizeDiff && !flags['no-minimize'],
		autoApprove: deps.config.autoApprove || Boolean(flags.yes || flags.y),
	};
	const operation = new EditOperation({ store: deps.store, sessions: new SessionStore(), config, requestConfirmation: deps.requestConfirmation });

	let markup: string;
	try {
		markup = deps.readText(markupPath);
	} catch (e) {
		deps.print(`Cannot read ${markupPath}: ${errorReason(e)}`);
		return 1;
	}
	const source: EditSource = looksLikeUnifiedDiff(markup) ? { kind: 'unifiedDiff', diff: markup, isFinal: true } : { kind: 'searchReplace', markup, isFinal: true };

	if (flags['dry-run']) {
		try {
			const hunks = await operation.plan(target, source);
			deps.print(hunks.length === 0 ? 'No changes' : hunks.map(formatHunk).join('\n'));
			return 0;
		} catch (e) {
			deps.print(errorReason(e));
			return 1;
		}
	}

	const result = await operation.apply(target, source);
	if (!result.success) {
		deps.print(result.error);
		return 1;
	}
	deps.print(`Patched ${target}`);
	return 0;
}

/** Renders a hunk in unified diff style with post-apply positions */
export function formatHunk(hunk: Hunk): string {
	const header = `@@ -${hunk.startLine},${hunk.oldLines.length} +${hunk.newStartLine},${hunk.newLines.length} @@`;
	return [header, ...hunk.oldLines.map((line) => `-${line}`), ...hunk.newLines.map((line) => `+${line}`)].join('\n');
}
