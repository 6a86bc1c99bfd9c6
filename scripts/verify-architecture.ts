// CHANGE: Automated architecture verification using ts-morph
// PURITY: SHELL (reads filesystem via ts-morph, exits process)
// INVARIANT: violations with severity "error" → exit(1)
// COMPLEXITY: O(n) where n = number of source files

import { Project } from "ts-morph";

import {
	type ArchitectureViolation,
	collectViolations,
} from "./architecture-rules.js";

function printViolations(
	title: string,
	violations: readonly ArchitectureViolation[],
	sink: (line: string) => void,
): void {
	if (violations.length === 0) return;
	sink(title);
	for (const v of violations) {
		sink(
			`  [${v.severity.toUpperCase()}] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`,
		);
	}
}

/**
 * Запускает все проверки архитектуры
 *
 * @pure false - executes all checkers, exits process
 */
async function verifyArchitecture(): Promise<void> {
	console.log("🔍 Verifying architecture rules...\n");

	const project = new Project({ tsConfigFilePath: "tsconfig.json" });
	const violations = collectViolations(project.getSourceFiles());
	const errors = violations.filter((v) => v.severity === "error");
	const warnings = violations.filter((v) => v.severity === "warning");

	printViolations("❌ Architecture ERRORS found:\n", errors, (l) =>
		console.error(l),
	);
	printViolations("⚠️  Architecture WARNINGS found:\n", warnings, (l) =>
		console.warn(l),
	);

	if (violations.length > 0) {
		console.error(
			`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`,
		);
	} else {
		console.log("✅ Architecture verification passed!");
		console.log("   - CORE does not import SHELL or APP");
		console.log("   - CORE has no console/process side effects");
		console.log("   - only src/shell/http touches the network");
	}

	if (errors.length > 0) {
		process.exit(1);
	}
}

await verifyArchitecture();
