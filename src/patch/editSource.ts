import type { EditBlock } from '#shared/patch/patch.model';
import { parseEditBlocks } from './editBlockParser';
import { ParseError } from './patchErrors';
import { unifiedDiffToMarkup } from './unifiedDiff';

/**
 * The shapes an edit can arrive in. Resolved once into edit blocks by {@link resolveEditSource}.
 */
export type EditSource =
	| { kind: 'searchReplace'; markup: string; isFinal: boolean }
	| { kind: 'unifiedDiff'; diff: string; isFinal: boolean }
	| { kind: 'strReplace'; oldStr: string; newStr: string; replaceAll?: boolean; isFinal: boolean }
	/** Inserts after 1-based line `insertLine`; 0 inserts at the top of the file */
	| { kind: 'insert'; insertLine: number; newStr: string }
	| { kind: 'create'; fileText: string };

export interface ResolvedEdit {
	blocks: EditBlock[];
	/** Replace every occurrence of the single block rather than the first */
	replaceAll: boolean;
}

export function isFinalSource(source: EditSource): boolean {
	return source.kind === 'insert' || source.kind === 'create' || source.isFinal;
}

/**
 * Splits text into lines, dropping the empty element produced by a trailing newline.
 */
export function splitLines(text: string): string[] {
	if (text === '') return [];
	const lines = text.split(/\r?\n/);
	if (lines[lines.length - 1] === '') lines.pop();
	return lines;
}

export function resolveEditSource(source: EditSource): ResolvedEdit {
	switch (source.kind) {
		case 'searchReplace':
			return { blocks: parseEditBlocks(source.markup, { isFinal: source.isFinal }), replaceAll: false };
		case 'unifiedDiff':
			return { blocks: parseEditBlocks(unifiedDiffToMarkup(source.diff), { isFinal: source.isFinal, repair: false }), replaceAll: false };
		case 'strReplace':
			return { blocks: strReplaceBlocks(source.oldStr, source.newStr, source.isFinal), replaceAll: source.replaceAll === true };
		case 'insert':
			return { blocks: [{ oldLines: [], newLines: splitLines(source.newStr), isPartial: false, anchorLine: source.insertLine + 1 }], replaceAll: false };
		case 'create':
			return { blocks: [{ oldLines: [], newLines: splitLines(source.fileText), isPartial: false, anchorLine: 1 }], replaceAll: false };
	}
}

function strReplaceBlocks(oldStr: string, newStr: string, isFinal: boolean): EditBlock[] {
	const oldLines = splitLines(oldStr);
	if (oldLines.length === 0) {
		if (isFinal) throw new ParseError('old string is empty');
		return [];
	}
	let newLines = splitLines(newStr).map((line) => line.trimEnd());
	if (isFinal) return [{ oldLines, newLines, isPartial: false }];

	// The last streamed line may still be growing
	if (!newStr.endsWith('\n')) newLines = newLines.slice(0, -1);
	return [{ oldLines, newLines: newLines.slice(0, oldLines.length), isPartial: true }];
}
