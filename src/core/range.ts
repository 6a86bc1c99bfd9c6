// CHANGE: Pure parsing and matching of range API bodies
// FORMAT THEOREM: isSuffixListed(body, s) ↔ ∃r ∈ parse(body): r.suffix = s ∧ r.count > 0
// PURITY: CORE
// INVARIANT: Malformed records are skipped, never raised
// COMPLEXITY: O(n) where n = |body|

import { Option } from "effect";

import type { RangeRecord } from "./models.js";

const DECIMAL = /^\d+$/;

/**
 * Parse one `SUFFIX:COUNT` line.
 *
 * Both fields are trimmed, so `ABC: 3` parses. A record whose count is
 * empty or not a decimal integer (`ABC:`, `ABC:x1`) is malformed.
 *
 * @param line - raw response line, possibly ending in `\r`
 * @returns Some(record), or None when the line is not exactly two
 *          colon-separated fields with a decimal count
 *
 * @pure true
 * @invariant result = Some(r) → r.count ≥ 0
 * @complexity O(n) where n = |line|
 */
export function parseRangeRecord(line: string): Option.Option<RangeRecord> {
	const fields = line.trim().split(":");
	if (fields.length !== 2) return Option.none();

	const [suffix = "", count = ""] = fields.map((field) => field.trim());
	if (suffix.length === 0 || !DECIMAL.test(count)) return Option.none();

	return Option.some({ suffix, count: Number.parseInt(count, 10) });
}

/**
 * Parse a whole range body, dropping malformed lines.
 *
 * @pure true
 * @invariant |result| ≤ |lines(body)|
 * @complexity O(n) where n = |body|
 */
export function parseRangeResponse(body: string): readonly RangeRecord[] {
	const records: RangeRecord[] = [];
	for (const line of body.split("\n")) {
		const record = parseRangeRecord(line);
		if (Option.isSome(record)) records.push(record.value);
	}
	return records;
}

/**
 * Decide whether a digest suffix is listed in a range body.
 *
 * Comparison is exact; both sides are uppercase. Padding records
 * (count 0) are decoys and never match.
 *
 * @param body - `text/plain` response of `GET /range/{prefix}`
 * @param suffix - the 35 characters of the digest that were not transmitted
 * @returns true on the first listed match, false after a full scan
 *
 * @pure true
 * @invariant result → ∃ line: parse(line).suffix = suffix
 * @complexity O(n) where n = |body|
 */
export function isSuffixListed(body: string, suffix: string): boolean {
	for (const line of body.split("\n")) {
		const record = parseRangeRecord(line);
		if (
			Option.isSome(record) &&
			record.value.count > 0 &&
			record.value.suffix === suffix
		) {
			return true;
		}
	}
	return false;
}
