// CHANGE: Centralize test builders and in-process transport stubs
// INVARIANT: No builder reaches the network; stubs answer from memory

import { vi } from "vitest";
import { Chalk } from "chalk";

import type { Candidate } from "../../src/core/models.js";
import type { FetchLike } from "../../src/shell/http/range-client.js";
import { makeReporter, type Reporter } from "../../src/shell/output/reporter.js";

/** Range body with two listed suffixes. */
export const SAMPLE_BODY =
	"0018A45C4D1DEF81644B54AB7F969B88D65:3\n003D68EB55068C33ACE09247EE4C639306B:1";

/** SHA-1("password") split at the 5th character. */
export const PASSWORD_PREFIX = "5BAA6";
export const PASSWORD_SUFFIX = "1E4C9B93F3F0682250B6CF8331B7EE68FD8";

/** Build an argument candidate. */
export const argCandidate = (
	value: string,
	index = 1,
	total = 1,
): Candidate => ({ value, origin: { kind: "argument", index, total } });

/** Build a file-line candidate. */
export const lineCandidate = (value: string, line: number): Candidate => ({
	value,
	origin: { kind: "line", line },
});

/** Transport answering every request with the same body and status. */
export const stubFetch = (body: string, status = 200, statusText = "OK") =>
	vi.fn<FetchLike>(async () => new Response(body, { status, statusText }));

/** Transport that only settles when its request is aborted. */
export const hangingFetch = () =>
	vi.fn<FetchLike>(
		(_url, init) =>
			new Promise<Response>((_resolve, reject) => {
				init.signal.addEventListener("abort", () => {
					reject(new Error("aborted"));
				});
			}),
	);

/** Transport failing like an unreachable host. */
export const failingFetch = (message: string) =>
	vi.fn<FetchLike>(async () => {
		throw new TypeError(message);
	});

/** Reporter writing uncolored lines into arrays. */
export const captureReporter = (): {
	readonly reporter: Reporter;
	readonly out: string[];
	readonly err: string[];
} => {
	const out: string[] = [];
	const err: string[] = [];
	const reporter = makeReporter({
		out: (line) => {
			out.push(line);
		},
		err: (line) => {
			err.push(line);
		},
		chalk: new Chalk({ level: 0 }),
	});
	return { reporter, out, err };
};
