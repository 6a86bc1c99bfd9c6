// CHANGE: CLI option types for the range checker
// PURITY: CORE

/**
 * Опции командной строки pwned-check.
 *
 * @property passwords Positional candidates; empty selects file mode
 * @property inputFile Path of the newline-delimited candidate file
 * @property inputFileExplicit True when the path came from -i/--input
 * @property hashed Candidates are SHA-1 hex digests already
 * @property hidePassword Never echo candidates in output
 * @property showHelp Print usage and stop
 * @property showCredits Print credits and stop
 * @property showStats Print the summary after the run
 * @property usageErrors Problems found while parsing, in order
 */
export interface CLIOptions {
	readonly passwords: readonly string[];
	readonly inputFile: string;
	readonly inputFileExplicit: boolean;
	readonly hashed: boolean;
	readonly hidePassword: boolean;
	readonly showHelp: boolean;
	readonly showCredits: boolean;
	readonly showStats: boolean;
	readonly usageErrors: readonly string[];
}
