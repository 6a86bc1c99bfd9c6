// CHANGE: Unit tests for the Digest Builder
// INVARIANT: ∀d: d.prefix + d.suffix = d.value ∧ |d.value| = 40

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { buildDigest, sha1Hex, splitDigest } from "../../src/core/digest.js";

const HEX40 = /^[0-9A-F]{40}$/;

describe("sha1Hex", () => {
	it("matches known SHA-1 vectors", () => {
		expect(sha1Hex("password")).toBe("5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8");
		expect(sha1Hex("abc")).toBe("A9993E364706816ABA3E25717850C26C9CD0D89D");
		expect(sha1Hex("")).toBe("DA39A3EE5E6B4B0D3255BFEF95601890AFD80709");
	});

	it("hashes the UTF-8 bytes of non-ASCII input", () => {
		expect(sha1Hex("pässwörd")).toBe("F517DDF1D32A112FF1AD55C66D1B12CB38E7E8F7");
	});

	it("hashes byte input unchanged, without decoding it", () => {
		const latin1 = Uint8Array.from([0x70, 0xe4, 0x73, 0x73]);
		expect(sha1Hex(latin1)).toBe("8B31F4083151C9B013F9BF85C064980B03707962");
		expect(sha1Hex(Buffer.from("password"))).toBe(sha1Hex("password"));
	});
});

describe("splitDigest", () => {
	it("splits into a 5-character prefix and 35-character suffix", () => {
		const digest = splitDigest("5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8");
		expect(digest.prefix).toBe("5BAA6");
		expect(digest.suffix).toBe("1E4C9B93F3F0682250B6CF8331B7EE68FD8");
		expect(digest.prefix + digest.suffix).toBe(digest.value);
	});
});

describe("buildDigest: plaintext", () => {
	it("is deterministic and yields 40 uppercase hex characters", () => {
		for (const input of ["password", "hunter2", " spaced ", "", "ünïcödé"]) {
			const first = buildDigest(input, false);
			const second = buildDigest(input, false);
			expect(first).toStrictEqual(second);
			expect(Either.isRight(first)).toBe(true);
			if (Either.isRight(first)) {
				expect(first.right.value).toMatch(HEX40);
				expect(first.right.prefix + first.right.suffix).toBe(first.right.value);
			}
		}
	});

	it("hashes the raw input without trimming", () => {
		const padded = buildDigest(" password", false);
		expect(Either.isRight(padded) && padded.right.value).not.toBe(
			"5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8",
		);
	});

	it("produces the known digest of 'password'", () => {
		expect(buildDigest("password", false)).toStrictEqual(
			Either.right({
				value: "5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8",
				prefix: "5BAA6",
				suffix: "1E4C9B93F3F0682250B6CF8331B7EE68FD8",
			}),
		);
	});
});

describe("buildDigest: pre-hashed", () => {
	it("validates a digest given as bytes", () => {
		const result = buildDigest(
			Buffer.from("5baa61e4c9b93f3f0682250b6cf8331b7ee68fd8"),
			true,
		);
		expect(Either.isRight(result) && result.right.prefix).toBe("5BAA6");
	});

	it("uppercases a lowercase digest without altering its content", () => {
		const result = buildDigest("5baa61e4c9b93f3f0682250b6cf8331b7ee68fd8", true);
		expect(Either.isRight(result)).toBe(true);
		if (Either.isRight(result)) {
			expect(result.right.value).toBe("5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8");
		}
	});

	it("passes an uppercase digest through unchanged", () => {
		const hash = "A9993E364706816ABA3E25717850C26C9CD0D89D";
		const result = buildDigest(hash, true);
		expect(Either.isRight(result) && result.right.value).toBe(hash);
	});

	it("ignores surrounding whitespace", () => {
		const result = buildDigest("  a9993e364706816aba3e25717850c26c9cd0d89d\r", true);
		expect(Either.isRight(result) && result.right.value).toBe(
			"A9993E364706816ABA3E25717850C26C9CD0D89D",
		);
	});

	it("rejects input of the wrong length", () => {
		const result = buildDigest("5BAA6", true);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("MalformedHashInput");
			expect(result.left.length).toBe(5);
			expect(result.left.reason).toBe("expected 40 hex characters, got 5");
		}
	});

	it("rejects non-hexadecimal characters", () => {
		const result = buildDigest("Z".repeat(40), true);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.reason).toBe("contains non-hexadecimal characters");
			expect(result.left.length).toBe(40);
		}
	});
});

describe("buildDigest invariants", () => {
	const hexDigest = fc
		.array(fc.constantFrom(..."0123456789abcdefABCDEF"), {
			minLength: 40,
			maxLength: 40,
		})
		.map((chars) => chars.join(""));

	it("returns the uppercased input for every 40-character hex digest", () => {
		fc.assert(
			fc.property(hexDigest, (hash) => {
				expect(buildDigest(hash, true)).toStrictEqual(
					Either.right(splitDigest(hash.toUpperCase())),
				);
			}),
		);
	});

	it("hashes every plaintext to a well-formed digest", () => {
		fc.assert(
			fc.property(fc.string(), (plaintext) => {
				const result = buildDigest(plaintext, false);
				expect(Either.isRight(result)).toBe(true);
				if (Either.isRight(result)) {
					expect(result.right.value).toBe(sha1Hex(plaintext));
					expect(result.right.value).toMatch(HEX40);
					expect(result.right.prefix).toHaveLength(5);
					expect(result.right.prefix + result.right.suffix).toBe(
						result.right.value,
					);
				}
			}),
		);
	});
});
