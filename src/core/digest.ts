// CHANGE: Digest Builder: candidate to uppercase SHA-1 hex, split for k-Anonymity
// FORMAT THEOREM: ∀p: buildDigest(p, false) = upper(hex(sha1(bytes(p))))
// PURITY: CORE
// INVARIANT: ∀d ∈ Digest: d.prefix + d.suffix = d.value ∧ |d.value| = 40
// COMPLEXITY: O(n) where n = |input|

import { createHash } from "node:crypto";
import { Either } from "effect";

import { DIGEST_HEX_LENGTH, PREFIX_LENGTH } from "./config.js";
import { MalformedHashInput } from "./errors.js";
import type { Digest } from "./models.js";

const HEX_DIGEST = /^[0-9a-fA-F]+$/;

/**
 * Split a normalized digest into the transmitted prefix and the local suffix.
 *
 * @param value - 40 uppercase hex characters
 * @returns Digest with prefix = value[0:5] and suffix = value[5:]
 *
 * @pure true
 * @invariant result.prefix + result.suffix = value
 * @complexity O(1)
 */
export function splitDigest(value: string): Digest {
	return {
		value,
		prefix: value.slice(0, PREFIX_LENGTH),
		suffix: value.slice(PREFIX_LENGTH),
	};
}

/**
 * SHA-1 of a plaintext as uppercase hex. Strings are hashed as UTF-8;
 * byte input is hashed unchanged.
 *
 * @pure true
 * @invariant |result| = 40
 * @complexity O(n) where n = |plaintext|
 */
export function sha1Hex(plaintext: string | Uint8Array): string {
	const hash = createHash("sha1");
	const updated =
		typeof plaintext === "string"
			? hash.update(plaintext, "utf8")
			: hash.update(plaintext);
	return updated.digest("hex").toUpperCase();
}

const asText = (input: string | Uint8Array): string =>
	typeof input === "string" ? input : new TextDecoder().decode(input);

function validateHashed(
	input: string,
): Either.Either<string, MalformedHashInput> {
	const trimmed = input.trim();
	if (trimmed.length !== DIGEST_HEX_LENGTH) {
		return Either.left(
			new MalformedHashInput({
				length: trimmed.length,
				reason: `expected ${DIGEST_HEX_LENGTH} hex characters, got ${trimmed.length}`,
			}),
		);
	}
	if (!HEX_DIGEST.test(trimmed)) {
		return Either.left(
			new MalformedHashInput({
				length: trimmed.length,
				reason: "contains non-hexadecimal characters",
			}),
		);
	}
	return Either.right(trimmed.toUpperCase());
}

/**
 * Build the digest of a candidate.
 *
 * @param input - plaintext password (text or raw bytes), or a SHA-1 hex digest when `alreadyHashed`
 * @param alreadyHashed - skip hashing and only validate and uppercase
 * @returns Right(Digest), or Left(MalformedHashInput) for a bad pre-hashed input
 *
 * @pure true
 * @invariant alreadyHashed ∧ isHex40(h) → result = Right(split(upper(h)))
 * @invariant ¬alreadyHashed → result is Right
 * @complexity O(n) where n = |input|
 *
 * @example
 * ```ts
 * const digest = buildDigest("password", false);
 * // Right({ value: "5BAA61E4C9B93F3F0682250B6CF8331B7EE68FD8", prefix: "5BAA6", ... })
 * ```
 */
export function buildDigest(
	input: string | Uint8Array,
	alreadyHashed: boolean,
): Either.Either<Digest, MalformedHashInput> {
	if (!alreadyHashed) {
		return Either.right(splitDigest(sha1Hex(input)));
	}
	return Either.map(validateHashed(asText(input)), splitDigest);
}
