import path from 'node:path';

export class CliArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CliArgumentError';
	}
}

export interface CliOptions {
	/** Name of the executed .ts file without the extension */
	scriptName: string;
	/** Arguments that are neither flags nor flag values, in order */
	positional: string[];
	/** Map of every CLI flag and its value (boolean true when no value) */
	flags: Record<string, string | boolean>;
}

export function parseProcessArgs(booleanFlags: readonly string[] = []): CliOptions {
	const scriptPath = process.argv[1] ?? '';
	const baseName = scriptPath.split(path.sep).at(-1) ?? '';
	const scriptName = baseName.replace(/\.[cm]?[jt]s$/, '');
	return parseUserCliArgs(scriptName, process.argv.slice(2), booleanFlags);
}

/**
 * Splits command line arguments into flags and positional arguments.
 *
 * Flags take the forms `--foo`, `--foo=bar`, `--foo bar`, `-f`, `-f=bar` and `-f bar`. A flag named in
 * `booleanFlags` never takes the following argument as its value. Everything after `--` is positional.
 */
export function parseUserCliArgs(scriptName: string, scriptArgs: readonly string[], booleanFlags: readonly string[] = []): CliOptions {
	const flags: Record<string, string | boolean> = {};
	const positional: string[] = [];

	for (let i = 0; i < scriptArgs.length; i++) {
		const tok = scriptArgs[i];
		if (tok === '--') {
			positional.push(...scriptArgs.slice(i + 1));
			break;
		}
		if (!tok.startsWith('-') || tok === '-') {
			positional.push(tok);
			continue;
		}

		const body = tok.startsWith('--') ? tok.slice(2) : tok.slice(1);
		const eq = body.indexOf('=');
		const key = eq > -1 ? body.slice(0, eq) : body;
		if (key === '' || key.startsWith('-')) throw new CliArgumentError(`Invalid flag "${tok}"`);

		if (eq > -1) {
			flags[key] = body.slice(eq + 1);
			continue;
		}

		const next = scriptArgs[i + 1];
		if (!booleanFlags.includes(key) && next !== undefined && !next.startsWith('-')) {
			flags[key] = next;
			i++;
		} else {
			flags[key] = true;
		}
	}

	return { scriptName, positional, flags };
}
