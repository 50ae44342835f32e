import Pino from 'pino';

// https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#logseverity
const SEVERITY: Record<string, string> = {
	trace: 'DEBUG',
	debug: 'DEBUG',
	info: 'INFO',
	warn: 'WARNING',
	error: 'ERROR',
	fatal: 'CRITICAL',
};

/**
 * Pino options for the given environment.
 * LOG_LEVEL sets the level (default info). LOG_PRETTY=true swaps JSON lines for pino-pretty output.
 */
export function loggerOptions(env: Record<string, string | undefined> = process.env): Pino.LoggerOptions {
	return {
		level: (env.LOG_LEVEL || 'info').toLowerCase(),
		messageKey: 'message',
		timestamp: false,
		formatters: {
			level(label: string, number: number) {
				return { severity: SEVERITY[label] ?? 'INFO', level: number };
			},
			log(object: Record<string, unknown>) {
				const err = object.err;
				if (err instanceof Error && err.stack) return { ...object, stack_trace: err.stack };
				return object;
			},
		},
		transport: env.LOG_PRETTY === 'true' ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
	};
}

/** Logger shared by the engine, the CLI and the tests */
export const logger: Pino.Logger = Pino(loggerOptions());
