// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Full CLI run for programmatic usage.
 *
 * @example
 * ```typescript
 * import { runCheck, parseCLIArgs } from 'pwned-range-check';
 *
 * const exitCode = await runCheck(parseCLIArgs(['--hide', '--stats', 'hunter2']));
 * ```
 */
export {
	type RunDependencies,
	runCheck,
	runCheckEffect,
} from "./app/runCheck.js";
export { checkCandidate, checkPassword } from "./app/checkCandidate.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure k-Anonymity protocol)
// ═══════════════════════════════════════════════════════════════════════════════

export { buildDigest, sha1Hex, splitDigest } from "./core/digest.js";
export {
	isSuffixListed,
	parseRangeRecord,
	parseRangeResponse,
} from "./core/range.js";
export { emptyStatistics, recordVerdict, tally } from "./core/stats.js";
export {
	InputFileError,
	MalformedHashInput,
	NetworkError,
	ServiceError,
	type AppError,
	type CheckFailure,
	type LookupError,
} from "./core/errors.js";
export type {
	Candidate,
	CandidateOrigin,
	CheckOutcome,
	CLIOptions,
	Digest,
	ExitCode,
	RangeRecord,
	RunStatistics,
	Verdict,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Transport, configuration, output)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type FetchLike,
	makeRangeClient,
	type RangeClient,
	type RangeClientOptions,
} from "./shell/http/range-client.js";
export { parseCLIArgs } from "./shell/config/index.js";
export { makeReporter, type Reporter } from "./shell/output/reporter.js";
