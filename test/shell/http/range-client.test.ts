// CHANGE: Range client tests against an in-process transport stub
// INVARIANT: Only the 5-character prefix is ever transmitted
// PURITY: SHELL - exercises Effect-based HTTP with a stubbed fetch

import { Effect, Either } from "effect";
import { describe, expect, it, vi } from "vitest";

import { splitDigest } from "../../../src/core/digest.js";
import {
	type FetchLike,
	makeRangeClient,
} from "../../../src/shell/http/range-client.js";
import {
	failingFetch,
	hangingFetch,
	PASSWORD_PREFIX,
	PASSWORD_SUFFIX,
	SAMPLE_BODY,
	stubFetch,
} from "../../utils/builders.js";

const listedDigest = splitDigest("21BD10018A45C4D1DEF81644B54AB7F969B88D65");
const unlistedDigest = splitDigest(`21BD1${"F".repeat(35)}`);

describe("checkExposure: verdicts", () => {
	it("returns true when the suffix is listed", async () => {
		const client = makeRangeClient({ fetch: stubFetch(SAMPLE_BODY) });
		await expect(Effect.runPromise(client.checkExposure(listedDigest))).resolves.toBe(true);
	});

	it("returns false when the suffix is absent", async () => {
		const client = makeRangeClient({ fetch: stubFetch(SAMPLE_BODY) });
		await expect(Effect.runPromise(client.checkExposure(unlistedDigest))).resolves.toBe(false);
	});

	it("skips malformed lines without failing", async () => {
		const client = makeRangeClient({ fetch: stubFetch(`BADLINE\r\n${SAMPLE_BODY}\r\n`) });
		await expect(Effect.runPromise(client.checkExposure(listedDigest))).resolves.toBe(true);
	});
});

describe("checkExposure: privacy", () => {
	it("sends only the 5-character prefix", async () => {
		const transport = stubFetch(`${PASSWORD_SUFFIX}:10`);
		const client = makeRangeClient({ fetch: transport });
		const digest = splitDigest(`${PASSWORD_PREFIX}${PASSWORD_SUFFIX}`);

		await expect(Effect.runPromise(client.checkExposure(digest))).resolves.toBe(true);

		expect(transport).toHaveBeenCalledTimes(1);
		const call = transport.mock.calls[0];
		const url = call?.[0] ?? "";
		expect(url).toBe("https://api.pwnedpasswords.com/range/5BAA6");
		expect(url.slice(url.lastIndexOf("/") + 1)).toHaveLength(5);
		expect(url).not.toContain(PASSWORD_SUFFIX);
		expect(JSON.stringify(call?.[1].headers)).not.toContain(PASSWORD_SUFFIX);
	});

	it("sends the user agent and padding headers", async () => {
		const transport = stubFetch(SAMPLE_BODY);
		await Effect.runPromise(makeRangeClient({ fetch: transport }).fetchRange("21BD1"));
		expect(transport.mock.calls[0]?.[1].headers).toStrictEqual({
			"User-Agent": "pwned-range-check",
			"Add-Padding": "true",
		});
		expect(transport.mock.calls[0]?.[1].method).toBe("GET");
	});

	it("omits the padding header when padding is disabled", async () => {
		const transport = stubFetch(SAMPLE_BODY);
		const client = makeRangeClient({ fetch: transport, addPadding: false, baseUrl: "http://range.test/" });
		await Effect.runPromise(client.fetchRange("21BD1"));
		const call = transport.mock.calls[0];
		expect(call?.[0]).toBe("http://range.test/range/21BD1");
		expect(call?.[1].headers).toStrictEqual({ "User-Agent": "pwned-range-check" });
	});
});

describe("checkExposure: failures", () => {
	it("fails with ServiceError on a non-success status", async () => {
		const client = makeRangeClient({ fetch: stubFetch("", 503, "Service Unavailable") });
		const result = await Effect.runPromise(Effect.either(client.checkExposure(listedDigest)));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ServiceError");
			if (result.left._tag === "ServiceError") {
				expect(result.left.status).toBe(503);
				expect(result.left.statusText).toBe("Service Unavailable");
			}
		}
	});

	it("fails with a transport NetworkError when the host is unreachable", async () => {
		const client = makeRangeClient({ fetch: failingFetch("fetch failed") });
		const result = await Effect.runPromise(Effect.either(client.checkExposure(listedDigest)));
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("NetworkError");
			if (result.left._tag === "NetworkError") {
				expect(result.left.reason).toBe("transport");
				expect(result.left.detail).toBe("fetch failed");
			}
		}
	});

	it("fails with a timeout NetworkError and aborts the request", async () => {
		const transport = hangingFetch();
		const client = makeRangeClient({ fetch: transport, timeoutMs: 20 });
		const result = await Effect.runPromise(Effect.either(client.checkExposure(listedDigest)));

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("NetworkError");
			if (result.left._tag === "NetworkError") {
				expect(result.left.reason).toBe("timeout");
				expect(result.left.detail).toBe("request timed out after 20ms");
			}
		}
		expect(transport.mock.calls[0]?.[1].signal.aborted).toBe(true);
	});

	it("fails with a transport NetworkError when the body cannot be read", async () => {
		const transport = vi.fn<FetchLike>(async () =>
			Object.assign(new Response("unused"), {
				text: () => Promise.reject(new Error("stream broke")),
			}),
		);
		const client = makeRangeClient({ fetch: transport });
		const result = await Effect.runPromise(Effect.either(client.checkExposure(listedDigest)));

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result) && result.left._tag === "NetworkError") {
			expect(result.left.reason).toBe("transport");
			expect(result.left.detail).toBe("Error reading API response: stream broke");
		} else {
			expect.fail("expected a NetworkError");
		}
	});

	it("times out while the body is still arriving", async () => {
		const transport = vi.fn<FetchLike>(async () =>
			Object.assign(new Response("unused"), {
				text: () => new Promise<string>(() => undefined),
			}),
		);
		const client = makeRangeClient({ fetch: transport, timeoutMs: 20 });
		const result = await Effect.runPromise(Effect.either(client.checkExposure(listedDigest)));

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result) && result.left._tag === "NetworkError") {
			expect(result.left.reason).toBe("timeout");
			expect(result.left.detail).toBe("request timed out after 20ms");
		} else {
			expect.fail("expected a NetworkError");
		}
	});

	it("uses a 10 second timeout by default", () => {
		expect(makeRangeClient({ fetch: stubFetch("") }).options.timeoutMs).toBe(10_000);
	});
});
