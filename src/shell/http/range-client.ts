// CHANGE: Range Lookup Client: the only module that talks to the network
// FORMAT THEOREM: ∀d ∈ Digest: request(checkExposure(d)).url = baseUrl + "/range/" + d.prefix
// PURITY: SHELL (HTTP)
// EFFECT: Effect<boolean, NetworkError | ServiceError>
// INVARIANT: Only the 5-character prefix leaves the process; no retries
// COMPLEXITY: O(n) where n = |response body|

import { Duration, Effect } from "effect";

import {
	ADD_PADDING,
	LOOKUP_TIMEOUT_MS,
	RANGE_API_BASE_URL,
	USER_AGENT,
} from "../../core/config.js";
import { NetworkError, ServiceError } from "../../core/errors.js";
import type { LookupError } from "../../core/errors.js";
import type { Digest } from "../../core/models.js";
import { isSuffixListed } from "../../core/range.js";

/**
 * Transport used by the client. The global `fetch` satisfies it; tests pass a stub.
 */
export type FetchLike = (
	input: string,
	init: {
		readonly method: "GET";
		readonly headers: Readonly<Record<string, string>>;
		readonly signal: AbortSignal;
	},
) => Promise<Response>;

export interface RangeClientOptions {
	readonly baseUrl: string;
	readonly timeoutMs: number;
	readonly userAgent: string;
	readonly addPadding: boolean;
	readonly fetch: FetchLike;
}

/**
 * Long-lived, configuration-scoped client for the range endpoint.
 */
export interface RangeClient {
	readonly options: Omit<RangeClientOptions, "fetch">;
	/** Fetch the raw `SUFFIX:COUNT` body for a prefix. */
	readonly fetchRange: (prefix: string) => Effect.Effect<string, LookupError>;
	/** True when the digest's suffix is listed under its prefix. */
	readonly checkExposure: (digest: Digest) => Effect.Effect<boolean, LookupError>;
}

const describeCause = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const rangeUrl = (baseUrl: string, prefix: string): string =>
	`${baseUrl.replace(/\/+$/, "")}/range/${encodeURIComponent(prefix)}`;

function requestHeaders(
	options: Omit<RangeClientOptions, "fetch">,
): Readonly<Record<string, string>> {
	return options.addPadding
		? { "User-Agent": options.userAgent, "Add-Padding": "true" }
		: { "User-Agent": options.userAgent };
}

/**
 * Create a range client.
 *
 * @param overrides - options replacing the defaults from core/config
 * @returns client sharing one transport and one timeout for every call
 *
 * @pure false (performs HTTP on use)
 * @invariant timeout applies to the whole exchange, headers and body
 *
 * @example
 * ```ts
 * const client = makeRangeClient();
 * const listed = await Effect.runPromise(client.checkExposure(digest));
 * ```
 */
export function makeRangeClient(
	overrides: Partial<RangeClientOptions> = {},
): RangeClient {
	const { fetch: transport = globalThis.fetch, ...rest } = overrides;
	const options: Omit<RangeClientOptions, "fetch"> = {
		baseUrl: rest.baseUrl ?? RANGE_API_BASE_URL,
		timeoutMs: rest.timeoutMs ?? LOOKUP_TIMEOUT_MS,
		userAgent: rest.userAgent ?? USER_AGENT,
		addPadding: rest.addPadding ?? ADD_PADDING,
	};
	const headers = requestHeaders(options);

	const fetchRange = (prefix: string): Effect.Effect<string, LookupError> =>
		Effect.gen(function* () {
			// Interruption by the timeout aborts `signal`, cancelling the request
			const response = yield* Effect.tryPromise({
				try: (signal) =>
					transport(rangeUrl(options.baseUrl, prefix), {
						method: "GET",
						headers,
						signal,
					}),
				catch: (error) =>
					new NetworkError({ reason: "transport", detail: describeCause(error) }),
			});

			if (response.status !== 200) {
				return yield* Effect.fail(
					new ServiceError({
						status: response.status,
						statusText: response.statusText,
					}),
				);
			}

			return yield* Effect.tryPromise({
				try: () => response.text(),
				catch: (error) =>
					new NetworkError({
						reason: "transport",
						detail: `Error reading API response: ${describeCause(error)}`,
					}),
			});
		}).pipe(
			Effect.timeoutFail({
				duration: Duration.millis(options.timeoutMs),
				onTimeout: () =>
					new NetworkError({
						reason: "timeout",
						detail: `request timed out after ${options.timeoutMs}ms`,
					}),
			}),
		);

	const checkExposure = (digest: Digest): Effect.Effect<boolean, LookupError> =>
		fetchRange(digest.prefix).pipe(
			Effect.map((body) => isSuffixListed(body, digest.suffix)),
		);

	return { options, fetchRange, checkExposure };
}
