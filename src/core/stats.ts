// CHANGE: Pure tally of verdicts for the --stats summary
// PURITY: CORE
// INVARIANT: total = exposed + clear + unknown after every step
// COMPLEXITY: O(1) per outcome

import type { CheckOutcome, RunStatistics, Verdict } from "./models.js";

export const emptyStatistics: RunStatistics = {
	total: 0,
	exposed: 0,
	clear: 0,
	unknown: 0,
};

/**
 * Add one verdict to the tally.
 *
 * @pure true
 * @invariant result.total = stats.total + 1
 * @complexity O(1)
 */
export function recordVerdict(
	stats: RunStatistics,
	verdict: Verdict,
): RunStatistics {
	return {
		...stats,
		total: stats.total + 1,
		[verdict]: stats[verdict] + 1,
	};
}

/**
 * Tally a sequence of outcomes.
 *
 * @pure true
 * @invariant result.total = |outcomes|
 * @complexity O(n) where n = |outcomes|
 */
export function tally(outcomes: readonly CheckOutcome[]): RunStatistics {
	return outcomes.reduce<RunStatistics>(
		(acc, outcome) => recordVerdict(acc, outcome.verdict),
		emptyStatistics,
	);
}
