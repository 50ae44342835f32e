import { readFileSync } from 'node:fs';
import readline from 'node:readline';
import { loadEngineConfig } from '#config/engineConfig';
import { registerErrorHandlers } from '#errorHandlers';
import { FileSystemLineStore } from '#files/fileSystemLineStore';
import { logger } from '#o11y/logger';
import { runPatchCommand } from './patchCommand';

// Usage:
// npm run patch -- <file> <markup-file> [--yes] [--no-minimize] [--dry-run]

function askYesNo(message: string): Promise<boolean> {
	const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
	return new Promise((resolve) => {
		rl.question(`${message} [y/N] `, (answer) => {
			rl.close();
			resolve(/^y(es)?$/i.test(answer.trim()));
		});
	});
}

async function main(): Promise<number> {
	registerErrorHandlers(true);
	return runPatchCommand(process.argv.slice(2), {
		store: new FileSystemLineStore(process.cwd()),
		config: loadEngineConfig(),
		readText: (path) => readFileSync(path, 'utf8'),
		requestConfirmation: askYesNo,
		print: (text) => console.log(text),
	});
}

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((e) => {
		logger.error(e, 'hunkwise failed');
		process.exitCode = 1;
	});
