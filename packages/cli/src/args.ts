import { ConfigurationError, Err, Ok, type Result } from "@loadstone/core";

/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command (e.g. ["object-store"]) */
	command: string[];
	/** Named flags (e.g. --table becomes { table: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/** Flags that never take a value, so a following word stays positional. */
const BOOLEAN_FLAGS = new Set([
	"help",
	"version",
	"skip-table-creation",
	"create-table",
	"optimize",
]);

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - A command before flags
 * - Positional arguments mixed with flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const command: string[] = [];
	const flags: Record<string, string> = {};
	const positional: string[] = [];

	let i = 0;

	// Consume the first non-flag word as the command
	if (i < args.length && !args[i]!.startsWith("-")) {
		command.push(args[i]!);
		i++;
	}

	// Parse remaining as flags and positional args
	while (i < args.length) {
		const arg = args[i]!;

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				// --flag=value
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else {
				// --flag value
				const key = arg.slice(2);
				const nextArg = args[i + 1];
				if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith("-")) {
					flags[key] = nextArg;
					i++;
				} else {
					flags[key] = "true";
				}
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			// Short flags are switches only (-h, -v)
			flags[arg.slice(1)] = "true";
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}

/** Get a required flag value. */
export function requireFlag(
	flags: Readonly<Record<string, string>>,
	name: string,
): Result<string, ConfigurationError> {
	const value = flags[name];
	if (value === undefined || value === "true" || value === "") {
		return Err(new ConfigurationError(`--${name} is required`));
	}
	return Ok(value);
}

/** Parse `key=value,key2=value2` into a record. */
export function parseKeyValueList(value: string): Result<Record<string, string>, ConfigurationError> {
	const pairs: Record<string, string> = {};
	for (const item of value.split(",")) {
		const trimmed = item.trim();
		if (trimmed === "") continue;
		const equalIdx = trimmed.indexOf("=");
		if (equalIdx <= 0) {
			return Err(new ConfigurationError(`Expected key=value, got "${trimmed}"`));
		}
		pairs[trimmed.slice(0, equalIdx).trim()] = trimmed.slice(equalIdx + 1).trim();
	}
	return Ok(pairs);
}
