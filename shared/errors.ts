/** A line store could not read the file at `path`. `code` is the underlying errno code where there is one. */
export class FileNotFound extends Error {
	readonly code: string;

	constructor(
		readonly path: string,
		detail?: string,
		code = 'ENOENT',
	) {
		super(detail ? `File ${path} ${detail}` : `File ${path} does not exist`);
		this.name = 'FileNotFound';
		this.code = code;
		Object.setPrototypeOf(this, FileNotFound.prototype);
	}
}

/** A path resolved outside the directory a line store is confined to. */
export class NotAllowed extends Error {
	readonly code = 'NOT_ALLOWED';

	constructor(
		readonly path: string,
		readonly basePath: string,
	) {
		super(`Path ${path} is outside ${basePath}`);
		this.name = 'NotAllowed';
		Object.setPrototypeOf(this, NotAllowed.prototype);
	}
}
