import { expect } from 'chai';
import { IncompleteSessionError, LocateError, ParseError, errorReason, isPatchError } from './patchErrors';

describe('patchErrors', () => {
	it('prefixes engine errors with their code', () => {
		expect(errorReason(new ParseError())).to.equal('NoBlocksFound: No SEARCH/REPLACE blocks found');
		expect(errorReason(LocateError.notFound(0, ['a', 'b']))).to.equal('NotFound: Failed to find the old string of block 1:\na\nb');
		expect(errorReason(new IncompleteSessionError([0, 2]))).to.equal('IncompleteSession: Cannot finalize: 2 hunk(s) still pending (0, 2)');
	});

	it('uses the message of other errors and stringifies anything else', () => {
		expect(errorReason(new Error('boom'))).to.equal('boom');
		expect(errorReason('plain')).to.equal('plain');
	});

	it('keeps instanceof working for each error class', () => {
		const error = LocateError.notFound(1, ['x']);
		expect(error).to.be.instanceOf(LocateError);
		expect(error).to.be.instanceOf(Error);
		expect(isPatchError(error)).to.be.true;
		expect(isPatchError(new Error('other'))).to.be.false;
	});
});
