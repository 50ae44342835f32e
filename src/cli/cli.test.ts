import { expect } from 'chai';
import { CliArgumentError, parseUserCliArgs } from './cli';

describe('parseUserCliArgs', () => {
	it('should collect positional arguments in order', () => {
		const result = parseUserCliArgs('test', ['a.txt', 'edits.md']);
		expect(result.positional).to.deep.equal(['a.txt', 'edits.md']);
		expect(result.flags).to.deep.equal({});
		expect(result.scriptName).to.equal('test');
	});

	it('should parse long and short flags with values', () => {
		const result = parseUserCliArgs('test', ['--mode=fast', '-l', 'x', '--level', '3', 'file.txt']);
		expect(result.flags).to.deep.equal({ mode: 'fast', l: 'x', level: '3' });
		expect(result.positional).to.deep.equal(['file.txt']);
	});

	it('should not take a value for boolean flags', () => {
		const result = parseUserCliArgs('test', ['--yes', 'a.txt', 'edits.md'], ['yes']);
		expect(result.flags).to.deep.equal({ yes: true });
		expect(result.positional).to.deep.equal(['a.txt', 'edits.md']);
	});

	it('should set a flag followed by another flag to true', () => {
		const result = parseUserCliArgs('test', ['--dry-run', '--no-minimize']);
		expect(result.flags).to.deep.equal({ 'dry-run': true, 'no-minimize': true });
	});

	it('should treat everything after -- as positional', () => {
		const result = parseUserCliArgs('test', ['--yes', '--', '--not-a-flag'], ['yes']);
		expect(result.positional).to.deep.equal(['--not-a-flag']);
	});

	it('should throw CliArgumentError for an empty flag name', () => {
		expect(() => parseUserCliArgs('test', ['---'])).to.throw(CliArgumentError, 'Invalid flag "---"');
	});
});
