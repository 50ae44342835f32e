import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '#test/testUtils';
import type { EditBlock } from '#shared/patch/patch.model';
import { applyHunks, planHunks } from './hunkPlanner';
import { LocateError } from './patchErrors';

const block = (oldLines: string[], newLines: string[], anchorLine?: number): EditBlock => ({ oldLines, newLines, isPartial: false, anchorLine });
const options = { minimizeDiff: true, fuzzyMatch: true };

describe('hunkPlanner', () => {
	setupConditionalLoggerOutput();

	describe('planHunks', () => {
		it('replaces one line with two', () => {
			const snapshot = ['a', 'b', 'c'];
			const hunks = planHunks(snapshot, [block(['b'], ['x', 'y'])], options);
			expect(hunks).to.have.length(1);
			expect(hunks[0].startLine).to.equal(2);
			expect(hunks[0].endLine).to.equal(2);
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['a', 'x', 'y', 'c']);
		});

		it('offsets a second block by the growth of the first', () => {
			const snapshot = ['a', 'b', 'c', 'd'];
			const hunks = planHunks(snapshot, [block(['b'], ['x', 'y']), block(['d'], ['z'])], options);
			expect(hunks[1].newStartLine).to.equal(5);
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['a', 'x', 'y', 'c', 'z']);
		});

		it('leaves the file unchanged for a no-op block', () => {
			const snapshot = ['one', 'two', 'three'];
			const minimized = planHunks(snapshot, [block(['two', 'three'], ['two', 'three'])], options);
			expect(minimized).to.deep.equal([]);
			const whole = planHunks(snapshot, [block(['two', 'three'], ['two', 'three'])], { ...options, minimizeDiff: false });
			expect(applyHunks(snapshot, whole)).to.deep.equal(snapshot);
		});

		it('matches a repeated search text at successive occurrences in document order', () => {
			const snapshot = ['x', 'dup', 'y', 'dup'];
			const hunks = planHunks(snapshot, [block(['dup'], ['first']), block(['dup'], ['second'])], options);
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['x', 'first', 'y', 'second']);
		});

		it('positions each minimized hunk at the line it changes', () => {
			const snapshot = ['a', 'b', 'c', 'd', 'e'];
			const hunks = planHunks(snapshot, [block(['b', 'c'], ['B', 'c']), block(['d', 'e'], ['d', 'E'])], options);
			expect(hunks.map((h) => h.startLine)).to.deep.equal([2, 5]);
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['a', 'B', 'c', 'd', 'E']);
		});

		it('throws Overlap when two blocks change the same lines', () => {
			try {
				planHunks(['a', 'b', 'c', 'd'], [block(['b', 'c'], ['X']), block(['c', 'd'], ['Y'])], options);
				expect.fail('expected LocateError');
			} catch (e) {
				expect(e).to.be.instanceOf(LocateError);
				if (!(e instanceof LocateError)) return;
				expect(e.code).to.equal('Overlap');
				expect(e.blockIndex).to.equal(1);
			}
		});

		it('fails the whole pass when any block is not found', () => {
			expect(() => planHunks(['a', 'b'], [block(['a'], ['A']), block(['missing'], ['M'])], options)).to.throw(LocateError, 'block 2');
		});

		it('inserts at an anchor line before a replacement on the same line', () => {
			const snapshot = ['a', 'b', 'c'];
			const hunks = planHunks(snapshot, [block([], ['i'], 2), block(['b'], ['B'])], options);
			expect(hunks.map((h) => [h.newStartLine, h.newEndLine])).to.deep.equal([
				[2, 2],
				[3, 3],
			]);
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['a', 'i', 'B', 'c']);
		});

		it('appends a block without search lines or anchor', () => {
			const snapshot = ['a'];
			expect(applyHunks(snapshot, planHunks(snapshot, [block([], ['n'])], options))).to.deep.equal(['a', 'n']);
		});

		it('rejects an anchor outside the file', () => {
			expect(() => planHunks(['a', 'b', 'c'], [block([], ['n'], 10)], options)).to.throw(LocateError, 'outside the file');
		});

		it('replaces every occurrence with replaceAll', () => {
			const snapshot = ['foo', 'bar', 'foo'];
			const hunks = planHunks(snapshot, [block(['foo'], ['baz'])], { ...options, replaceAll: true });
			expect(applyHunks(snapshot, hunks)).to.deep.equal(['baz', 'bar', 'baz']);
		});
	});

	describe('applyHunks', () => {
		it('returns a copy of the lines when there are no hunks', () => {
			const lines = ['a', 'b'];
			const result = applyHunks(lines, []);
			expect(result).to.deep.equal(lines);
			expect(result).to.not.equal(lines);
		});
	});
});
