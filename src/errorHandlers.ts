import { logger } from '#o11y/logger';

/**
 * Registers uncaughtException and unhandledRejection handlers that log through the shared logger.
 * @param terminateOnError exit with code 1 shortly after logging
 */
export function registerErrorHandlers(terminateOnError = false): void {
	const exitSoon = () => {
		if (!terminateOnError) return;
		// Leave pending log writes a moment to flush
		setTimeout(() => process.exit(1), 500).unref();
	};

	process.on('uncaughtException', (err, origin) => {
		logger.fatal({ err, origin }, `Uncaught exception: ${err.message}`);
		exitSoon();
	});

	process.on('unhandledRejection', (reason) => {
		const err = reason instanceof Error ? reason : new Error(String(reason));
		logger.fatal({ err }, `Unhandled promise rejection: ${err.message}`);
		exitSoon();
	});
}
