// CHANGE: Typed error ADT for the range-check domain using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Pre-hashed candidate is not a 40-character hexadecimal digest.
 *
 * Carries only the length of the rejected input, never the input itself,
 * so that a mistyped plaintext cannot leak into logs.
 *
 * @pure true (Data class)
 * @invariant reason.length > 0
 */
export class MalformedHashInput extends Data.TaggedError("MalformedHashInput")<{
	readonly length: number;
	readonly reason: string;
}> {}

/**
 * The range endpoint could not be reached, or the exchange did not finish.
 *
 * @pure true (Data class)
 * @invariant reason ∈ {"timeout", "transport"}
 */
export class NetworkError extends Data.TaggedError("NetworkError")<{
	readonly reason: "timeout" | "transport";
	readonly detail: string;
}> {}

/**
 * The range endpoint answered with a non-success status.
 *
 * @pure true (Data class)
 * @invariant status ≠ 200
 */
export class ServiceError extends Data.TaggedError("ServiceError")<{
	readonly status: number;
	readonly statusText: string;
}> {}

/**
 * Candidate input file could not be read.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InputFileError extends Data.TaggedError("InputFileError")<{
	readonly path: string;
	readonly detail: string;
	readonly code?: string;
}> {}

/** Failures of one range lookup. */
export type LookupError = NetworkError | ServiceError;

/**
 * Failures that turn a single candidate's verdict into "unknown".
 *
 * @invariant never aborts a batch
 */
export type CheckFailure = MalformedHashInput | LookupError;

/** Union of every application error. */
export type AppError = CheckFailure | InputFileError;
