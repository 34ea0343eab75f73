/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print an error to stderr. */
export function printError(message: string): void {
	process.stderr.write(`Error: ${message}\n`);
}

/** Print a warning to stderr. */
export function warn(message: string): void {
	process.stderr.write(`Warning: ${message}\n`);
}

/** Print an error to stderr and exit with the given code. */
export function fatal(message: string, code = 1): never {
	printError(message);
	process.exit(code);
}
