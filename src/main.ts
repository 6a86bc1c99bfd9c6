// CHANGE: Thin APP delegator: parse CLI options and run
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating
// COMPLEXITY: O(1)

import { runCheck } from "./app/runCheck.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return runCheck(parseCLIArgs(args));
}
