// CHANGE: Pure decision function mapping run state to an exit code
// FORMAT THEOREM: ∀s ∈ State: (s.usageError ∨ s.inputFailed) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes the process exit code from the run state.
 *
 * @param state - flags collected while running
 * @returns 1 for an invalid invocation or an unreadable input file; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition lookup failures alone never yield 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ usageError: false, inputFailed: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.usageError || s.inputFailed,
		(failed): ExitCode => (failed ? 1 : 0),
	);
