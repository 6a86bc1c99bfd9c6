// CHANGE: Pure formatting of outcomes, failures and the statistics summary
// PURITY: CORE
// INVARIANT: No side effects; deterministic mapping from inputs to lines
// COMPLEXITY: O(1) per outcome

import { match } from "ts-pattern";

import type { CheckFailure } from "../errors.js";
import type { CheckOutcome, RunStatistics } from "../models.js";

/**
 * Semantic color of a report line; SHELL maps tones to terminal colors.
 */
export type Tone = "plain" | "bad" | "good" | "warn";

export interface ReportLine {
	readonly tone: Tone;
	readonly text: string;
}

const line = (tone: Tone, text: string): ReportLine => ({ tone, text });

/**
 * Human-readable reason of a failed check. Never includes the candidate.
 *
 * @pure true
 * @invariant result.length > 0
 * @complexity O(1)
 */
export function formatFailure(failure: CheckFailure): string {
	return match(failure)
		.with(
			{ _tag: "MalformedHashInput" },
			({ reason }) => `Malformed hash input: ${reason}`,
		)
		.with(
			{ _tag: "NetworkError" },
			({ detail }) => `Error making API request: ${detail}`,
		)
		.with({ _tag: "ServiceError" }, ({ status, statusText }) => {
			const shown =
				statusText.length > 0 ? `${status} ${statusText}` : String(status);
			return `API request failed with status: ${shown}`;
		})
		.exhaustive();
}

/**
 * Render elapsed wall-clock time.
 *
 * @pure true
 * @invariant ms < 1000 → result ends with "ms"; otherwise with "s"
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatElapsed(250);  // "250ms"
 * formatElapsed(1234); // "1.234s"
 * ```
 */
export function formatElapsed(ms: number): string {
	const whole = Math.max(0, Math.round(ms));
	if (whole < 1000) return `${whole}ms`;
	return `${(whole / 1000).toFixed(3)}s`;
}

function passwordLine(
	outcome: CheckOutcome,
	hidePassword: boolean,
): readonly ReportLine[] {
	return hidePassword
		? []
		: [line("plain", `Password: ${outcome.candidate.value}`)];
}

function describeArgumentOutcome(
	outcome: CheckOutcome,
	index: number,
	total: number,
	hidePassword: boolean,
): readonly ReportLine[] {
	const header = line("plain", `\nChecking password ${index} of ${total}:`);
	const verdictLine = match<CheckOutcome, ReportLine>(outcome)
		.with({ verdict: "exposed" }, () => line("bad", "BAD PASSWORD FOUND"))
		.with({ verdict: "clear" }, () => line("good", "Good password"))
		.with({ verdict: "unknown" }, ({ failure }) =>
			line("warn", `Lookup failed: ${formatFailure(failure)}`),
		)
		.exhaustive();
	return [header, verdictLine, ...passwordLine(outcome, hidePassword)];
}

function describeLineOutcome(
	outcome: CheckOutcome,
	lineNumber: number,
	hidePassword: boolean,
): readonly ReportLine[] {
	return match<CheckOutcome, readonly ReportLine[]>(outcome)
		.with({ verdict: "clear" }, () => [])
		.with({ verdict: "exposed" }, () => [
			line("bad", `BAD PASSWORD FOUND ON LINE: ${lineNumber}`),
			...passwordLine(outcome, hidePassword),
		])
		.with({ verdict: "unknown" }, ({ failure }) => [
			line(
				"warn",
				`LOOKUP FAILED ON LINE: ${lineNumber}: ${formatFailure(failure)}`,
			),
			...passwordLine(outcome, hidePassword),
		])
		.exhaustive();
}

/**
 * Lines reported for one outcome.
 *
 * Argument candidates always get a header and a verdict; file candidates
 * are reported only when exposed or when the lookup failed.
 *
 * @pure true
 * @invariant hidePassword → ∀l ∈ result: ¬l.text.startsWith("Password:")
 * @complexity O(1)
 */
export function describeOutcome(
	outcome: CheckOutcome,
	hidePassword: boolean,
): readonly ReportLine[] {
	const { origin } = outcome.candidate;
	return origin.kind === "argument"
		? describeArgumentOutcome(outcome, origin.index, origin.total, hidePassword)
		: describeLineOutcome(outcome, origin.line, hidePassword);
}

/**
 * Lines of the --stats summary.
 *
 * @pure true
 * @invariant |result| = 5
 * @complexity O(1)
 */
export function describeStatistics(
	stats: RunStatistics,
	elapsedMs: number,
): readonly ReportLine[] {
	return [
		line("plain", `\nTotal runtime: ${formatElapsed(elapsedMs)}`),
		line("plain", `Total passwords checked: ${stats.total}`),
		line("bad", `Bad passwords found: ${stats.exposed}`),
		line("good", `Good passwords: ${stats.clear}`),
		line("warn", `Unknown (lookup failed): ${stats.unknown}`),
	];
}
