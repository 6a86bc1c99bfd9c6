// CHANGE: Console reporter: maps CORE report lines to colored terminal output
// PURITY: SHELL (console I/O)
// INVARIANT: Every line written passes through exactly one tone color
// COMPLEXITY: O(n) where n = number of lines

import chalk, { type ChalkInstance } from "chalk";
import { match } from "ts-pattern";

import type { CheckOutcome, RunStatistics } from "../../core/models.js";
import {
	describeOutcome,
	describeStatistics,
	type ReportLine,
	type Tone,
} from "../../core/format/report.js";
import { CREDITS_TEXT, HELP_TEXT } from "../../core/format/help.js";

export type LineSink = (line: string) => void;

export interface ReporterOptions {
	readonly out: LineSink;
	readonly err: LineSink;
	readonly chalk: ChalkInstance;
}

/**
 * Output surface of a run.
 */
export interface Reporter {
	readonly outcome: (outcome: CheckOutcome, hidePassword: boolean) => void;
	readonly statistics: (stats: RunStatistics, elapsedMs: number) => void;
	readonly help: () => void;
	readonly credits: () => void;
	readonly notice: (message: string) => void;
	readonly error: (message: string) => void;
}

function paint(c: ChalkInstance, tone: Tone, text: string): string {
	return match(tone)
		.with("bad", () => c.red(text))
		.with("good", () => c.green(text))
		.with("warn", () => c.yellow(text))
		.with("plain", () => text)
		.exhaustive();
}

/**
 * Create a reporter writing to the console by default.
 *
 * @pure false (writes to the sinks)
 */
export function makeReporter(overrides: Partial<ReporterOptions> = {}): Reporter {
	const out: LineSink = overrides.out ?? ((l) => console.log(l));
	const err: LineSink = overrides.err ?? ((l) => console.error(l));
	const c = overrides.chalk ?? chalk;

	const write = (lines: readonly ReportLine[]): void => {
		for (const { tone, text } of lines) out(paint(c, tone, text));
	};

	return {
		outcome: (outcome, hidePassword) =>
			write(describeOutcome(outcome, hidePassword)),
		statistics: (stats, elapsedMs) =>
			write(describeStatistics(stats, elapsedMs)),
		help: () => out(HELP_TEXT),
		credits: () => out(CREDITS_TEXT),
		notice: (message) => out(c.yellow(message)),
		error: (message) => err(c.red(message)),
	};
}
