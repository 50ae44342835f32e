import { DIVIDER_MARKER, REPLACE_MARKER, SEARCH_MARKER } from './constants';

const HUNK_HEADER_REGEX = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/;

export function looksLikeUnifiedDiff(text: string): boolean {
	return text.split(/\r?\n/).some((line) => HUNK_HEADER_REGEX.test(line));
}

interface DiffHunk {
	search: string[];
	replace: string[];
}

/**
 * Converts unified diff text into SEARCH/REPLACE markup, one block per `@@` hunk.
 * Context lines go to both sides, `-` lines to the search side and `+` lines to the replace side.
 * The line numbers in the hunk headers are ignored: blocks are located by content.
 */
export function unifiedDiffToMarkup(diffText: string): string {
	const lines = diffText.split(/\r?\n/);
	const hunks: DiffHunk[] = [];
	let current: DiffHunk | undefined;

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		if (HUNK_HEADER_REGEX.test(line)) {
			current = { search: [], replace: [] };
			hunks.push(current);
			continue;
		}
		// A file header ends the current hunk
		if (line.startsWith('--- ') && lines[i + 1]?.startsWith('+++ ')) {
			current = undefined;
			i++;
			continue;
		}
		if (!current) continue;

		if (line.startsWith('\\')) continue; // "\ No newline at end of file"
		const marker = line.charAt(0);
		const content = line.substring(1);
		if (marker === '-') {
			current.search.push(content);
		} else if (marker === '+') {
			current.replace.push(content);
		} else if (marker === ' ' || line === '') {
			current.search.push(content);
			current.replace.push(content);
		}
	}

	return hunks
		.map((hunk) => trimTrailingBlankContext(hunk))
		.filter((hunk) => hunk.search.length > 0 || hunk.replace.length > 0)
		.map((hunk) => [SEARCH_MARKER, ...hunk.search, DIVIDER_MARKER, ...hunk.replace, REPLACE_MARKER].join('\n'))
		.join('\n\n');
}

/** Blank lines left at the end of a hunk by the separator between hunks are not context */
function trimTrailingBlankContext(hunk: DiffHunk): DiffHunk {
	const search = [...hunk.search];
	const replace = [...hunk.replace];
	while (search.length > 0 && replace.length > 0 && search[search.length - 1] === '' && replace[replace.length - 1] === '') {
		search.pop();
		replace.pop();
	}
	return { search, replace };
}
