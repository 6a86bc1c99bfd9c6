// CHANGE: Candidate sources: positional arguments and newline-delimited files
// PURITY: SHELL (reads filesystem)
// EFFECT: Effect<Candidate[], InputFileError>
// INVARIANT: Blank lines are skipped but still counted; file lines are hashed from their bytes
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import { Effect } from "effect";

import { InputFileError } from "../../core/errors.js";
import type { Candidate } from "../../core/models.js";

/**
 * Candidates from positional arguments, numbered 1..n.
 *
 * @pure true
 * @invariant |result| = |passwords|
 */
export function candidatesFromArguments(
	passwords: readonly string[],
): readonly Candidate[] {
	return passwords.map(
		(value, i): Candidate => ({
			value,
			origin: { kind: "argument", index: i + 1, total: passwords.length },
		}),
	);
}

const NEWLINE = 0x0a;

// ASCII whitespace, as String.prototype.trim sees it
const isBlankByte = (byte: number): boolean =>
	byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);

function trimBytes(line: Uint8Array): Uint8Array {
	let start = 0;
	let end = line.length;
	while (start < end && isBlankByte(line[start] ?? NEWLINE)) start++;
	while (end > start && isBlankByte(line[end - 1] ?? NEWLINE)) end--;
	return line.subarray(start, end);
}

/**
 * Split raw file contents into trimmed, non-empty candidates.
 *
 * Lines keep their bytes in `raw`; `value` is a UTF-8 decoding for display.
 *
 * @pure true
 * @invariant ∀c ∈ result: |c.raw| > 0 ∧ c.raw has no leading or trailing ASCII whitespace
 */
export function candidatesFromBytes(contents: Uint8Array): readonly Candidate[] {
	const decoder = new TextDecoder();
	const candidates: Candidate[] = [];
	let lineStart = 0;
	let lineNumber = 1;
	while (lineStart <= contents.length) {
		const found = contents.indexOf(NEWLINE, lineStart);
		const lineEnd = found === -1 ? contents.length : found;
		const raw = trimBytes(contents.subarray(lineStart, lineEnd));
		if (raw.length > 0) {
			candidates.push({
				value: decoder.decode(raw),
				raw,
				origin: { kind: "line", line: lineNumber },
			});
		}
		lineStart = lineEnd + 1;
		lineNumber++;
	}
	return candidates;
}

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Читает кандидатов из файла.
 *
 * @param path Путь к файлу
 * @returns Effect с кандидатами или InputFileError (code = "ENOENT" для отсутствующего файла)
 */
export function readCandidatesFromFile(
	path: string,
): Effect.Effect<readonly Candidate[], InputFileError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(path),
		catch: (error) => {
			const code = errorCode(error);
			const detail = error instanceof Error ? error.message : String(error);
			return code === undefined
				? new InputFileError({ path, detail })
				: new InputFileError({ path, detail, code });
		},
	}).pipe(Effect.map(candidatesFromBytes));
}
