// CHANGE: CLI argument parsing for pwned-check
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Option parsing stops at "--" or at the first positional argument
// COMPLEXITY: O(n) where n = |args|

import { DEFAULT_INPUT_FILE } from "../../core/config.js";
import type { CLIOptions } from "../../core/types/index.js";

type ParseState = CLIOptions;

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
	readonly positionalOnly: boolean;
}

type BooleanOption =
	| "hashed"
	| "hidePassword"
	| "showHelp"
	| "showCredits"
	| "showStats";

// Single- and double-dash spellings are equivalent
const booleanFlags: ReadonlyMap<string, BooleanOption> = new Map<
	string,
	BooleanOption
>([
	["h", "showHelp"],
	["help", "showHelp"],
	["c", "showCredits"],
	["credits", "showCredits"],
	["hashed", "hashed"],
	["hide", "hidePassword"],
	["stats", "showStats"],
]);

const inputFlags: ReadonlySet<string> = new Set(["i", "input"]);

const initialState: ParseState = {
	passwords: [],
	inputFile: DEFAULT_INPUT_FILE,
	inputFileExplicit: false,
	hashed: false,
	hidePassword: false,
	showHelp: false,
	showCredits: false,
	showStats: false,
	usageErrors: [],
};

const withError = (state: ParseState, message: string): ParseState => ({
	...state,
	usageErrors: [...state.usageErrors, message],
});

const positional = (state: ParseState, arg: string): ArgProcessResult => ({
	state: { ...state, passwords: [...state.passwords, arg] },
	skipNext: false,
	positionalOnly: true,
});

function parseBooleanValue(raw: string | undefined): boolean | null {
	if (raw === undefined || raw === "true" || raw === "1") return true;
	if (raw === "false" || raw === "0") return false;
	return null;
}

function processBooleanFlag(
	state: ParseState,
	arg: string,
	option: BooleanOption,
	inline: string | undefined,
): ArgProcessResult {
	const value = parseBooleanValue(inline);
	const next =
		value === null
			? withError(state, `invalid boolean value for ${arg}`)
			: { ...state, [option]: value };
	return { state: next, skipNext: false, positionalOnly: false };
}

function processInputFlag(
	state: ParseState,
	arg: string,
	inline: string | undefined,
	following: string | undefined,
): ArgProcessResult {
	const value = inline ?? following;
	if (value === undefined || value.length === 0) {
		return {
			state: withError(state, `option requires a value: ${arg}`),
			skipNext: false,
			positionalOnly: false,
		};
	}
	return {
		state: { ...state, inputFile: value, inputFileExplicit: true },
		skipNext: inline === undefined,
		positionalOnly: false,
	};
}

function processArgument(
	arg: string,
	following: string | undefined,
	state: ParseState,
): ArgProcessResult {
	if (arg === "--") {
		return { state, skipNext: false, positionalOnly: true };
	}
	if (!arg.startsWith("-") || arg === "-") {
		return positional(state, arg);
	}

	const body = arg.replace(/^--?/, "");
	const eq = body.indexOf("=");
	const name = eq === -1 ? body : body.slice(0, eq);
	const inline = eq === -1 ? undefined : body.slice(eq + 1);

	const option = booleanFlags.get(name);
	if (option !== undefined) {
		return processBooleanFlag(state, arg, option, inline);
	}
	if (inputFlags.has(name)) {
		return processInputFlag(state, arg, inline, following);
	}

	return {
		state: withError(state, `unknown option: ${arg}`),
		skipNext: false,
		positionalOnly: false,
	};
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Arguments without the node and script entries
 * @returns Опции командной строки
 *
 * @example
 * ```ts
 * // Command: pwned-check --hide --stats hunter2 letmein
 * const options = parseCLIArgs();
 * // Returns: { passwords: ["hunter2", "letmein"], hidePassword: true, showStats: true, ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state = initialState;
	let positionalOnly = false;

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (positionalOnly) {
			state = positional(state, arg).state;
			continue;
		}

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		positionalOnly = result.positionalOnly;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
