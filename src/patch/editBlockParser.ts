import { logger } from '#o11y/logger';
import type { EditBlock } from '#shared/patch/patch.model';
import { type BlockMarkers, DEFAULT_MARKERS } from './constants';
import { repairMarkup } from './markupRepair';
import { ParseError } from './patchErrors';

export interface ParseOptions {
	/** False while the markup is still being streamed */
	isFinal: boolean;
	markers?: BlockMarkers;
	/** Run repairMarkup before parsing. Defaults to true */
	repair?: boolean;
}

type ParserState = { kind: 'outside' } | { kind: 'search'; oldLines: string[]; markerLine: number } | { kind: 'replace'; oldLines: string[]; newLines: string[]; markerLine: number };

/**
 * Parses SEARCH/REPLACE markup into edit blocks, in document order.
 *
 * While streaming (`isFinal` false) a block whose REPLACE section has not been closed yet is
 * returned with `isPartial` set. A trailing line without its newline may still be growing and is
 * ignored, and no more replace lines are kept than there are search lines.
 * A block still inside its SEARCH section cannot be located yet and is left out.
 *
 * @throws ParseError when the markup is final and contains no well-formed block
 */
export function parseEditBlocks(markup: string, options: ParseOptions): EditBlock[] {
	const markers = options.markers ?? DEFAULT_MARKERS;
	const text = options.repair === false ? markup : repairMarkup(markup, markers).text;

	const lines = text.split(/\r?\n/);
	// The element after the last newline is either empty or, while streaming, a line that is still being written
	const trailing = lines.pop() ?? '';
	if (trailing !== '' && options.isFinal) lines.push(trailing);

	const blocks: EditBlock[] = [];
	let state: ParserState = { kind: 'outside' };

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		const isSearch = markers.search.test(line);

		switch (state.kind) {
			case 'outside':
				if (isSearch) state = { kind: 'search', oldLines: [], markerLine: i + 1 };
				break;
			case 'search':
				if (isSearch) {
					logger.warn(`Malformed block at line ${state.markerLine}: another SEARCH marker before the divider. Skipping block.`);
					state = { kind: 'search', oldLines: [], markerLine: i + 1 };
				} else if (markers.divider.test(line)) {
					state = { kind: 'replace', oldLines: state.oldLines, newLines: [], markerLine: state.markerLine };
				} else if (markers.replace.test(line)) {
					logger.warn(`Malformed block at line ${state.markerLine}: REPLACE marker without a divider. Skipping block.`);
					state = { kind: 'outside' };
				} else {
					state.oldLines.push(line);
				}
				break;
			case 'replace':
				if (markers.replace.test(line)) {
					blocks.push({ oldLines: state.oldLines, newLines: state.newLines, isPartial: false });
					state = { kind: 'outside' };
				} else if (isSearch) {
					logger.warn(`Malformed block at line ${state.markerLine}: another SEARCH marker before REPLACE. Skipping block.`);
					state = { kind: 'search', oldLines: [], markerLine: i + 1 };
				} else {
					state.newLines.push(line);
				}
				break;
		}
	}

	if (state.kind === 'replace') {
		if (options.isFinal) {
			logger.warn(`Unterminated block at line ${state.markerLine}: missing REPLACE marker. Skipping block.`);
		} else {
			blocks.push({ oldLines: state.oldLines, newLines: state.newLines.slice(0, state.oldLines.length), isPartial: true });
		}
	} else if (state.kind === 'search') {
		if (options.isFinal) logger.warn(`Unterminated block at line ${state.markerLine}: missing divider. Skipping block.`);
		else logger.debug(`Block at line ${state.markerLine} is still in its SEARCH section`);
	}

	if (blocks.length === 0 && options.isFinal) throw new ParseError();

	logger.debug(`Parsed ${blocks.length} edit block(s)${options.isFinal ? '' : ' from partial markup'}`);
	return blocks;
}
