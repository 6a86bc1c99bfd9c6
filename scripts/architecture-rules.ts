// CHANGE: Architecture rules as reusable checks over ts-morph source files
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ∩ (Shell ∪ App) = ∅
// PURITY: SHELL (ts-morph AST traversal)
// INVARIANT: Each rule returns violations or an empty array
// COMPLEXITY: O(n) where n = number of AST nodes per file

import { type SourceFile, SyntaxKind } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

const inLayer = (sourceFile: SourceFile, layer: string): boolean =>
	sourceFile.getFilePath().includes(`/src/${layer}/`);

/**
 * Проверяет, что CORE файлы не импортируют SHELL или APP
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	for (const importDecl of sourceFile.getImportDeclarations()) {
		const moduleSpecifier = importDecl.getModuleSpecifierValue();
		for (const layer of ["shell", "app"] as const) {
			if (moduleSpecifier.includes(`/${layer}/`)) {
				violations.push({
					file: sourceFile.getFilePath(),
					line: importDecl.getStartLineNumber(),
					rule: `core-no-${layer}-imports`,
					message: `CORE file imports ${layer.toUpperCase()}: ${moduleSpecifier}`,
					severity: "error",
				});
			}
		}
	}
	return violations;
}

// Receivers whose members are side effects in CORE
const IMPURE_RECEIVERS: ReadonlySet<string> = new Set(["console", "process"]);

/**
 * Проверяет отсутствие побочных эффектов в CORE
 *
 * @invariant ∀ f ∈ Core: ¬uses(f, console) ∧ ¬uses(f, process)
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	return sourceFile
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((node) => IMPURE_RECEIVERS.has(node.getExpression().getText()))
		.map((node) => ({
			file: sourceFile.getFilePath(),
			line: node.getStartLineNumber(),
			rule: "core-purity",
			message: `CORE contains side effect: ${node.getText()}`,
			severity: "error" as const,
		}));
}

/**
 * Only the range client may touch the network.
 *
 * @invariant ∀ f ∉ shell/http: ¬references(f, fetch)
 */
export function checkNetworkBoundary(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!sourceFile.getFilePath().includes("/src/")) return [];
	if (inLayer(sourceFile, "shell/http")) return [];

	return sourceFile
		.getDescendantsOfKind(SyntaxKind.Identifier)
		.filter((node) => node.getText() === "fetch")
		.filter((node) => {
			// `{ fetch: stub }` option keys are not calls into the network
			const parent = node.getParent();
			return parent?.getKind() !== SyntaxKind.PropertyAssignment;
		})
		.map((node) => ({
			file: sourceFile.getFilePath(),
			line: node.getStartLineNumber(),
			rule: "network-boundary",
			message: "fetch is referenced outside src/shell/http",
			severity: "error" as const,
		}));
}

/**
 * Проверяет наличие математических комментариев для функций CORE
 *
 * @invariant ∀ f ∈ ExportedCoreFunctions: tags(f) ⊇ {@pure, @invariant, @complexity}
 */
export function checkMathematicalComments(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	for (const func of sourceFile.getFunctions()) {
		if (!func.isExported()) continue;

		const docText = func
			.getJsDocs()
			.map((doc) => doc.getFullText())
			.join("\n");
		const missingTags = ["@pure", "@invariant", "@complexity"].filter(
			(tag) => !docText.includes(tag),
		);
		if (missingTags.length > 0) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: func.getStartLineNumber(),
				rule: "mathematical-comments",
				message: `Function '${func.getName() ?? "<anonymous>"}' missing tags: ${missingTags.join(", ")}`,
				severity: "warning",
			});
		}
	}
	return violations;
}

/**
 * Проверяет, что APP импортирует только разрешённые внешние зависимости
 *
 * @invariant ∀ f ∈ App: external_deps(f) ⊆ {effect}
 */
export function checkAppLayerDependencies(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "app")) return [];

	const allowedFrameworks = ["effect"];
	return sourceFile
		.getImportDeclarations()
		.filter((importDecl) => {
			const specifier = importDecl.getModuleSpecifierValue();
			if (specifier.startsWith(".")) return false;
			return !allowedFrameworks.some(
				(fw) => specifier === fw || specifier.startsWith(`${fw}/`),
			);
		})
		.map((importDecl) => ({
			file: sourceFile.getFilePath(),
			line: importDecl.getStartLineNumber(),
			rule: "app-layer-dependencies",
			message: `APP layer imports unexpected external dependency: ${importDecl.getModuleSpecifierValue()}`,
			severity: "warning" as const,
		}));
}

/**
 * Run every rule against a set of files.
 *
 * @complexity O(n · m) where n = files, m = avg nodes per file
 */
export function collectViolations(
	sourceFiles: readonly SourceFile[],
): readonly ArchitectureViolation[] {
	return sourceFiles
		.filter((sourceFile) => !sourceFile.getFilePath().includes("node_modules"))
		.flatMap((sourceFile) => [
			...checkCoreImports(sourceFile),
			...checkCorePurity(sourceFile),
			...checkNetworkBoundary(sourceFile),
			...checkMathematicalComments(sourceFile),
			...checkAppLayerDependencies(sourceFile),
		]);
}
