import { expect } from 'chai';
import { loggerOptions } from './logger';

describe('loggerOptions', () => {
	it('defaults to JSON output at info level', () => {
		const options = loggerOptions({});
		expect(options.level).to.equal('info');
		expect(options.messageKey).to.equal('message');
		expect(options.transport).to.be.undefined;
	});

	it('lower-cases LOG_LEVEL and enables pino-pretty with LOG_PRETTY', () => {
		const options = loggerOptions({ LOG_LEVEL: 'DEBUG', LOG_PRETTY: 'true' });
		expect(options.level).to.equal('debug');
		expect(options.transport).to.deep.equal({ target: 'pino-pretty', options: { colorize: true } });
	});

	it('maps levels to severities', () => {
		const level = loggerOptions({}).formatters?.level;
		expect(level?.('warn', 40)).to.deep.equal({ severity: 'WARNING', level: 40 });
		expect(level?.('fatal', 60)).to.deep.equal({ severity: 'CRITICAL', level: 60 });
	});

	it('adds the stack trace of a logged error', () => {
		const log = loggerOptions({}).formatters?.log;
		const err = new Error('boom');
		const formatted = log?.({ err });
		expect(formatted).to.have.property('stack_trace', err.stack);
		expect(log?.({ detail: 1 })).to.deep.equal({ detail: 1 });
	});
});
