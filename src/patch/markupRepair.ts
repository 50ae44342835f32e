import { logger } from '#o11y/logger';
import { type BlockMarkers, DEFAULT_MARKERS, DIVIDER_MARKER, REPLACE_MARKER, SEARCH_MARKER } from './constants';
import { looksLikeUnifiedDiff, unifiedDiffToMarkup } from './unifiedDiff';

export interface RepairResult {
	text: string;
	/** Human readable description of each repair made */
	repairs: string[];
}

// A marker run followed by content on the same line, e.g. "-------     // comment" or "======= foo"
const GLUED_SEARCH_REGEX = /^(\s*)(?:<{7}|-{7})[ \t]+(?!SEARCH\s*$)(\S.*)$/;
const GLUED_DIVIDER_REGEX = /^(\s*)={5,9}[ \t]+(\S.*)$/;
// "------- REPLACE" is the search-style marker mistakenly used where the divider or the REPLACE marker belongs
const MISUSED_REPLACE_REGEX = /^\s*-{5,9} ?REPLACE\s*$/;

type State = 'outside' | 'search' | 'replace';

/**
 * Repairs common mistakes in SEARCH/REPLACE markup so the parser can read it:
 *  - unified diff input is converted to SEARCH/REPLACE blocks
 *  - a marker glued to content on the same line is split onto two lines
 *  - "------- REPLACE" used as the divider or as the closing marker is rewritten
 *  - a divider repeated inside one block keeps only the last replace section
 */
export function repairMarkup(text: string, markers: BlockMarkers = DEFAULT_MARKERS): RepairResult {
	const repairs: string[] = [];

	let source = text;
	if (!hasAnyMarker(text, markers) && looksLikeUnifiedDiff(text)) {
		source = unifiedDiffToMarkup(text);
		repairs.push('converted unified diff to SEARCH/REPLACE blocks');
	}

	const input = source.split(/\r?\n/);
	const output: string[] = [];
	let state: State = 'outside';
	// Index in output of the first line of the current replace section
	let replaceSectionStart = -1;

	for (let i = 0; i < input.length; i++) {
		const line = input[i];

		if (markers.search.test(line)) {
			output.push(line);
			state = 'search';
			continue;
		}

		if (state === 'search') {
			if (markers.divider.test(line)) {
				output.push(line);
				state = 'replace';
				replaceSectionStart = output.length;
				continue;
			}
			if (MISUSED_REPLACE_REGEX.test(line)) {
				output.push(DIVIDER_MARKER);
				repairs.push(`line ${i + 1}: "------- REPLACE" used as divider`);
				state = 'replace';
				replaceSectionStart = output.length;
				continue;
			}
			const glued = GLUED_DIVIDER_REGEX.exec(line);
			if (glued) {
				output.push(DIVIDER_MARKER, `${glued[1]}${glued[2]}`);
				repairs.push(`line ${i + 1}: divider glued to content`);
				state = 'replace';
				replaceSectionStart = output.length - 1;
				continue;
			}
			output.push(line);
			continue;
		}

		if (state === 'replace') {
			if (markers.replace.test(line)) {
				output.push(line);
				state = 'outside';
				continue;
			}
			if (MISUSED_REPLACE_REGEX.test(line)) {
				output.push(REPLACE_MARKER);
				repairs.push(`line ${i + 1}: "------- REPLACE" used as closing marker`);
				state = 'outside';
				continue;
			}
			if (markers.divider.test(line)) {
				output.splice(replaceSectionStart);
				repairs.push(`line ${i + 1}: duplicated replace section dropped`);
				continue;
			}
			output.push(line);
			continue;
		}

		const glued = GLUED_SEARCH_REGEX.exec(line);
		if (glued) {
			output.push(SEARCH_MARKER, `${glued[1]}${glued[2]}`);
			repairs.push(`line ${i + 1}: SEARCH marker glued to content`);
			state = 'search';
			continue;
		}
		output.push(line);
	}

	if (repairs.length > 0) logger.warn({ repairs }, `Repaired SEARCH/REPLACE markup (${repairs.length} fix(es))`);
	return { text: output.join('\n'), repairs };
}

function hasAnyMarker(text: string, markers: BlockMarkers): boolean {
	return text.split(/\r?\n/).some((line) => markers.search.test(line) || markers.divider.test(line) || markers.replace.test(line));
}
