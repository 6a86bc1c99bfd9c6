// CHANGE: Functional Core domain models for the k-Anonymity range check
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { CheckFailure } from "./errors.js";

/**
 * Exit code for the checker process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Where a candidate came from: a command-line argument or a file line.
 *
 * @invariant index, total and line are 1-based; index ≤ total
 */
export type CandidateOrigin =
	| {
			readonly kind: "argument";
			readonly index: number;
			readonly total: number;
	  }
	| {
			readonly kind: "line";
			readonly line: number;
	  };

/**
 * A password to check, plaintext or pre-hashed.
 *
 * `value` is for display. File lines also carry their `raw` bytes, which
 * are hashed as read and never decoded first.
 */
export interface Candidate {
	readonly value: string;
	readonly raw?: Uint8Array;
	readonly origin: CandidateOrigin;
}

/**
 * Uppercase SHA-1 hex digest split for the range protocol.
 *
 * @remarks
 * - @invariant value.length = 40 ∧ /^[0-9A-F]{40}$/.test(value)
 * - @invariant prefix + suffix = value, |prefix| = 5, |suffix| = 35
 */
export interface Digest {
	readonly value: string;
	readonly prefix: string;
	readonly suffix: string;
}

/**
 * One `SUFFIX:COUNT` line of a range response.
 */
export interface RangeRecord {
	readonly suffix: string;
	readonly count: number;
}

/**
 * Verdict for one candidate.
 *
 * "unknown" means the lookup did not complete; it is never folded into "clear".
 */
export type Verdict = "exposed" | "clear" | "unknown";

/**
 * Immutable result of checking one candidate.
 */
export type CheckOutcome =
	| {
			readonly verdict: "exposed" | "clear";
			readonly candidate: Candidate;
	  }
	| {
			readonly verdict: "unknown";
			readonly candidate: Candidate;
			readonly failure: CheckFailure;
	  };

/**
 * Running tally of verdicts.
 *
 * @invariant total = exposed + clear + unknown
 */
export interface RunStatistics {
	readonly total: number;
	readonly exposed: number;
	readonly clear: number;
	readonly unknown: number;
}

/**
 * Flags from which the process exit code is derived.
 *
 * @remarks
 * - @pure true
 * - @invariant lookup failures are not represented here; they never fail a run
 */
export interface DecisionState {
	readonly usageError: boolean;
	readonly inputFailed: boolean;
}
