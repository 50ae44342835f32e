import { expect } from 'chai';
import type { MatchedBlock } from '#shared/patch/patch.model';
import { minimizeBlock } from './hunkMinimizer';

function matched(startLine: number, oldLines: string[], newLines: string[], isPartial = false): MatchedBlock {
	return { oldLines, newLines, isPartial, startLine, endLine: startLine + oldLines.length - 1, fuzzy: false };
}

describe('minimizeBlock', () => {
	it('returns the whole block as one hunk when minimization is off', () => {
		const hunks = minimizeBlock(matched(2, ['b'], ['x', 'y']), false);
		expect(hunks).to.deep.equal([{ oldLines: ['b'], newLines: ['x', 'y'], startLine: 2, endLine: 2, newStartLine: 2, newEndLine: 3 }]);
	});

	it('keeps an unchanged block as one hunk when minimization is off', () => {
		const hunks = minimizeBlock(matched(1, ['a', 'b'], ['a', 'b']), false);
		expect(hunks).to.have.length(1);
		expect(hunks[0].startLine).to.equal(1);
		expect(hunks[0].endLine).to.equal(2);
	});

	it('emits one hunk per changed run at its offset within the block', () => {
		const hunks = minimizeBlock(matched(10, ['a', 'b', 'c', 'd'], ['a', 'B', 'c', 'd', 'e']), true);
		expect(hunks).to.deep.equal([
			{ oldLines: ['b'], newLines: ['B'], startLine: 11, endLine: 11, newStartLine: 11, newEndLine: 11 },
			{ oldLines: [], newLines: ['e'], startLine: 14, endLine: 13, newStartLine: 14, newEndLine: 14 },
		]);
	});

	it('emits a pure deletion with no new lines', () => {
		const hunks = minimizeBlock(matched(1, ['keep', 'drop', 'keep2'], ['keep', 'keep2']), true);
		expect(hunks).to.deep.equal([{ oldLines: ['drop'], newLines: [], startLine: 2, endLine: 2, newStartLine: 2, newEndLine: 1 }]);
	});

	it('returns no hunks when the block changes nothing', () => {
		expect(minimizeBlock(matched(3, ['same'], ['same']), true)).to.deep.equal([]);
	});

	it('returns no hunks for an empty block', () => {
		expect(minimizeBlock(matched(3, [], []), false)).to.deep.equal([]);
	});

	it('treats a block without search lines as an insertion before its start line', () => {
		const hunks = minimizeBlock(matched(3, [], ['n']), true);
		expect(hunks).to.deep.equal([{ oldLines: [], newLines: ['n'], startLine: 3, endLine: 2, newStartLine: 3, newEndLine: 3 }]);
	});

	it('only diffs the covered prefix of a partial block', () => {
		const hunks = minimizeBlock(matched(5, ['a', 'b', 'c'], ['a', 'X'], true), true);
		expect(hunks).to.deep.equal([{ oldLines: ['b'], newLines: ['X'], startLine: 6, endLine: 6, newStartLine: 6, newEndLine: 6 }]);
	});

	it('returns no hunks for a partial block with no replace lines yet', () => {
		expect(minimizeBlock(matched(5, ['a', 'b'], [], true), true)).to.deep.equal([]);
	});
});
