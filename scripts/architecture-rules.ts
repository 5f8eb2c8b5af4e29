// Layering rules checked over the source tree with ts-morph.
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ∩ (Shell ∪ App) = ∅
// PURITY: SHELL (callers hand in ts-morph source files)
// INVARIANT: Rules return violations or an empty array; they never throw
// COMPLEXITY: O(n) where n = number of AST nodes per file

import { Node, type SourceFile } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

export type ArchitectureRule = (
	sourceFile: SourceFile,
) => readonly ArchitectureViolation[];

const inLayer = (sourceFile: SourceFile, layer: string): boolean =>
	sourceFile.getFilePath().includes(`/src/${layer}/`);

/**
 * CORE never imports SHELL or APP.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 * @complexity O(m) where m = number of imports in file
 */
export const checkCoreImportsNoShell: ArchitectureRule = (sourceFile) => {
	if (!inLayer(sourceFile, "core")) return [];

	return sourceFile.getImportDeclarations().flatMap((importDecl): ArchitectureViolation[] => {
		const specifier = importDecl.getModuleSpecifierValue();
		const layer = ["shell", "app"].find((name) =>
			specifier.includes(`/${name}/`),
		);
		if (layer === undefined) return [];
		return [
			{
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule: `core-no-${layer}-imports`,
				message: `CORE file imports ${layer.toUpperCase()}: ${specifier}`,
				severity: "error",
			},
		];
	});
};

const NODE_IO_MODULES = ["fs", "child_process", "net", "http", "https"];

/**
 * CORE reaches files only through an injected opener.
 *
 * @complexity O(m) where m = number of imports in file
 */
export const checkCoreNoNodeIo: ArchitectureRule = (sourceFile) => {
	if (!inLayer(sourceFile, "core")) return [];

	return sourceFile.getImportDeclarations().flatMap((importDecl): ArchitectureViolation[] => {
		const specifier = importDecl.getModuleSpecifierValue();
		const bare = specifier.replace(/^node:/, "").split("/")[0] ?? "";
		if (!NODE_IO_MODULES.includes(bare)) return [];
		return [
			{
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule: "core-no-node-io",
				message: `CORE file imports I/O module: ${specifier}`,
				severity: "error",
			},
		];
	});
};

const PROCESS_EFFECTS = [
	"process.exit",
	"process.env",
	"process.argv",
	"process.stdout",
	"process.stderr",
];

/**
 * CORE touches neither the console nor the process.
 *
 * @invariant ∀ f ∈ CoreFunctions: ¬hasSideEffects(f)
 * @complexity O(n) where n = number of nodes in AST
 */
export const checkCorePurity: ArchitectureRule = (sourceFile) => {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	sourceFile.forEachDescendant((node) => {
		if (!Node.isPropertyAccessExpression(node)) return;
		const text = node.getText();
		const effect =
			node.getExpression().getText() === "console"
				? text
				: PROCESS_EFFECTS.find((pattern) => text === pattern);
		if (effect === undefined) return;
		violations.push({
			file: sourceFile.getFilePath(),
			line: node.getStartLineNumber(),
			rule: "core-purity",
			message: `CORE contains side effect: ${effect}`,
			severity: "error",
		});
	});
	return violations;
};

const EXIT_POINT = "/src/shell/output/report.ts";

/**
 * Only the reporting module terminates the process.
 *
 * @complexity O(n) where n = number of nodes in AST
 */
export const checkSingleExitPoint: ArchitectureRule = (sourceFile) => {
	const filePath = sourceFile.getFilePath();
	if (!filePath.includes("/src/") || filePath.endsWith(EXIT_POINT)) return [];

	const violations: ArchitectureViolation[] = [];
	sourceFile.forEachDescendant((node) => {
		if (Node.isPropertyAccessExpression(node) && node.getText() === "process.exit") {
			violations.push({
				file: filePath,
				line: node.getStartLineNumber(),
				rule: "single-exit-point",
				message: "process.exit outside the reporting module",
				severity: "error",
			});
		}
	});
	return violations;
};

const APP_FRAMEWORKS = ["effect", "ts-pattern"];

/**
 * APP composes CORE and SHELL; external imports are limited to the frameworks.
 *
 * @invariant ∀ f ∈ App: external_deps(f) ⊆ allowed_frameworks
 * @complexity O(m) where m = number of imports
 */
export const checkAppLayerDependencies: ArchitectureRule = (sourceFile) => {
	if (!inLayer(sourceFile, "app")) return [];

	return sourceFile.getImportDeclarations().flatMap((importDecl): ArchitectureViolation[] => {
		const specifier = importDecl.getModuleSpecifierValue();
		if (specifier.startsWith(".")) return [];
		if (APP_FRAMEWORKS.some((framework) => specifier.startsWith(framework))) {
			return [];
		}
		return [
			{
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule: "app-layer-dependencies",
				message: `APP layer imports unexpected external dependency: ${specifier}`,
				severity: "warning",
			},
		];
	});
};

export const ARCHITECTURE_RULES: readonly ArchitectureRule[] = [
	checkCoreImportsNoShell,
	checkCoreNoNodeIo,
	checkCorePurity,
	checkSingleExitPoint,
	checkAppLayerDependencies,
];

/**
 * Runs every rule over every non-dependency source file.
 *
 * @complexity O(n * m) where n = files, m = avg nodes per file
 */
export function collectViolations(
	sourceFiles: readonly SourceFile[],
): readonly ArchitectureViolation[] {
	return sourceFiles
		.filter((sourceFile) => !sourceFile.getFilePath().includes("node_modules"))
		.flatMap((sourceFile) => ARCHITECTURE_RULES.flatMap((rule) => rule(sourceFile)));
}
