// CHANGE: Per-candidate check composing the Digest Builder with the range client
// PURITY: APP
// EFFECT: Effect<CheckOutcome, never>
// INVARIANT: Every failure becomes an "unknown" outcome; one candidate never aborts a batch
// COMPLEXITY: O(n) where n = |response body|

import { Effect, Either } from "effect";

import { buildDigest } from "../core/digest.js";
import type { CheckFailure } from "../core/errors.js";
import type { Candidate, CheckOutcome } from "../core/models.js";
import {
	makeRangeClient,
	type RangeClient,
} from "../shell/http/range-client.js";

const unknownOutcome = (
	candidate: Candidate,
	failure: CheckFailure,
): CheckOutcome => ({ verdict: "unknown", candidate, failure });

const listedOutcome = (candidate: Candidate, listed: boolean): CheckOutcome => ({
	verdict: listed ? "exposed" : "clear",
	candidate,
});

/**
 * Check one candidate against the breach corpus.
 *
 * @param candidate - plaintext or pre-hashed password with its origin
 * @param alreadyHashed - treat the candidate as a SHA-1 hex digest
 * @param client - shared range client
 * @returns Effect that always succeeds with the candidate's outcome
 *
 * @pure false (one HTTP round trip when the digest is valid)
 * @effect Effect<CheckOutcome, never>
 * @invariant result.candidate = candidate
 */
export function checkCandidate(
	candidate: Candidate,
	alreadyHashed: boolean,
	client: RangeClient,
): Effect.Effect<CheckOutcome> {
	return Either.match(buildDigest(candidate.raw ?? candidate.value, alreadyHashed), {
		onLeft: (failure) => Effect.succeed(unknownOutcome(candidate, failure)),
		onRight: (digest) =>
			client.checkExposure(digest).pipe(
				Effect.match({
					onFailure: (failure) => unknownOutcome(candidate, failure),
					onSuccess: (listed) => listedOutcome(candidate, listed),
				}),
			),
	});
}

/**
 * Promise API for checking a single password.
 *
 * @example
 * ```ts
 * const outcome = await checkPassword("correct horse battery staple");
 * if (outcome.verdict === "exposed") rotate();
 * ```
 */
export async function checkPassword(
	password: string,
	options: { readonly hashed?: boolean; readonly client?: RangeClient } = {},
): Promise<CheckOutcome> {
	const candidate: Candidate = {
		value: password,
		origin: { kind: "argument", index: 1, total: 1 },
	};
	return Effect.runPromise(
		checkCandidate(
			candidate,
			options.hashed ?? false,
			options.client ?? makeRangeClient(),
		),
	);
}
