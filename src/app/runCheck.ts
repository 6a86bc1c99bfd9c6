// CHANGE: Application layer orchestration of a checker run
// PURITY: APP (no process.exit; console output only through the Reporter)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Candidates are checked strictly one after another
// COMPLEXITY: O(n · latency) where n = number of candidates

import { Clock, Effect, Either } from "effect";

import { computeExitCode } from "../core/decision.js";
import type { InputFileError } from "../core/errors.js";
import type { Candidate, ExitCode } from "../core/models.js";
import { emptyStatistics, recordVerdict } from "../core/stats.js";
import type { CLIOptions } from "../core/types/index.js";
import { makeRangeClient, type RangeClient } from "../shell/http/range-client.js";
import {
	candidatesFromArguments,
	readCandidatesFromFile,
} from "../shell/input/candidates.js";
import { makeReporter, type Reporter } from "../shell/output/reporter.js";
import { checkCandidate } from "./checkCandidate.js";

/**
 * Collaborators of a run; every one can be replaced in tests.
 */
export interface RunDependencies {
	readonly client: RangeClient;
	readonly reporter: Reporter;
	readonly readCandidates: (
		path: string,
	) => Effect.Effect<readonly Candidate[], InputFileError>;
}

const OK = computeExitCode({ usageError: false, inputFailed: false });

function loadCandidates(
	options: CLIOptions,
	deps: RunDependencies,
): Effect.Effect<readonly Candidate[], InputFileError> {
	return options.passwords.length > 0
		? Effect.succeed(candidatesFromArguments(options.passwords))
		: deps.readCandidates(options.inputFile);
}

/**
 * Report an unreadable input file.
 *
 * A missing default file is not an error: the user most likely ran the
 * tool without arguments, so the usage is shown instead.
 */
function reportInputFailure(
	error: InputFileError,
	options: CLIOptions,
	reporter: Reporter,
): ExitCode {
	if (error.code === "ENOENT" && !options.inputFileExplicit) {
		reporter.notice("Default passwords file not found\n");
		reporter.help();
		return OK;
	}
	reporter.error(`Error opening file: ${error.detail}`);
	return computeExitCode({ usageError: false, inputFailed: true });
}

function reportUsageErrors(options: CLIOptions, reporter: Reporter): ExitCode {
	for (const message of options.usageErrors) {
		reporter.error(`✖ ${message}`);
	}
	reporter.help();
	return computeExitCode({ usageError: true, inputFailed: false });
}

/**
 * Run the checker as an Effect.
 *
 * @pure false (network, filesystem, console through dependencies)
 * @effect Effect<ExitCode, never>
 * @invariant lookup failures never change the exit code
 */
export function runCheckEffect(
	options: CLIOptions,
	deps: RunDependencies,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const { reporter } = deps;

		if (options.showHelp) {
			reporter.help();
			return OK;
		}
		if (options.showCredits) {
			reporter.credits();
			return OK;
		}
		if (options.usageErrors.length > 0) {
			return reportUsageErrors(options, reporter);
		}

		const loaded = yield* Effect.either(loadCandidates(options, deps));
		if (Either.isLeft(loaded)) {
			return reportInputFailure(loaded.left, options, reporter);
		}

		const startedAt = yield* Clock.currentTimeMillis;
		const stats = yield* Effect.reduce(
			loaded.right,
			emptyStatistics,
			(acc, candidate) =>
				checkCandidate(candidate, options.hashed, deps.client).pipe(
					Effect.tap((outcome) =>
						Effect.sync(() => reporter.outcome(outcome, options.hidePassword)),
					),
					Effect.map((outcome) => recordVerdict(acc, outcome.verdict)),
				),
		);

		if (options.showStats) {
			const finishedAt = yield* Clock.currentTimeMillis;
			reporter.statistics(stats, finishedAt - startedAt);
		}

		return OK;
	});
}

/**
 * Run the checker with default collaborators.
 *
 * @param options - parsed CLI options
 * @param overrides - replacements for the range client, reporter or file reader
 * @returns ExitCode (0 = run completed, 1 = usage or input file error)
 *
 * @example
 * ```ts
 * const exitCode = await runCheck(parseCLIArgs(["--stats", "hunter2"]));
 * ```
 */
export async function runCheck(
	options: CLIOptions,
	overrides: Partial<RunDependencies> = {},
): Promise<ExitCode> {
	const deps: RunDependencies = {
		client: overrides.client ?? makeRangeClient(),
		reporter: overrides.reporter ?? makeReporter(),
		readCandidates: overrides.readCandidates ?? readCandidatesFromFile,
	};
	return Effect.runPromise(runCheckEffect(options, deps));
}
