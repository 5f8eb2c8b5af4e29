// Command-line front end for the layering rules.
// PURITY: SHELL (reads the project through ts-morph, prints, exits)
// INVARIANT: Exits 1 iff at least one error-severity violation exists
// COMPLEXITY: O(n * m) where n = files, m = avg nodes per file

import { Project } from "ts-morph";

import { type ArchitectureViolation, collectViolations } from "./architecture-rules.js";

const formatViolation = (label: string, v: ArchitectureViolation): string =>
	`  [${label}] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`;

function verifyArchitecture(): void {
	console.log("🔍 Verifying architecture rules...\n");

	const project = new Project({ tsConfigFilePath: "tsconfig.json" });
	const violations = collectViolations(project.getSourceFiles());
	const errors = violations.filter((v) => v.severity === "error");
	const warnings = violations.filter((v) => v.severity === "warning");

	for (const v of errors) console.error(formatViolation("ERROR", v));
	for (const v of warnings) console.warn(formatViolation("WARN", v));

	if (violations.length === 0) {
		console.log("✅ Architecture verification passed!");
		return;
	}
	console.error(
		`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`,
	);
	if (errors.length > 0) process.exit(1);
}

verifyArchitecture();
