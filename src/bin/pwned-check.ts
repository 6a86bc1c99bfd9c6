#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for pwned-check.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 1 only for usage errors, unreadable input files or defects
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
