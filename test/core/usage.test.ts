// PURITY: CORE
// INVARIANT: Name column width = longest name (config flag included) + 5

import { describe, expect, it } from "vitest";

import { cell } from "../../src/core/destination.js";
import {
	HelpRequested,
	InvalidValue,
	MissingValue,
	OpenConfigFailed,
	UnknownFlag,
} from "../../src/core/errors.js";
import { FlagRegistry } from "../../src/core/registry.js";
import {
	defaultSuffix,
	describeFlagError,
	formatErrorLine,
	formatUsage,
} from "../../src/core/usage.js";

describe("formatUsage", () => {
	it("lays out the config flag, every flag and help", () => {
		const registry = new FlagRegistry();
		registry.registerConfigFlag("config", "c", "Read flags from an INI file");
		registry.bool(cell(false), "verbose", "v", "Verbose output");
		registry.int(cell(0), "port", "p", 8080, "Listen port");
		registry.string(cell(""), "name", "", "", "Service name");
		registry.double(cell(0), "ratio", "", 0.25, "Sample ratio");
		registry.time(cell(0), "start", "", 86_400, "Start time");
		registry.float(cell(0), "zero", "", 0, "Zero float");

		expect(formatUsage(registry)).toBe(
			[
				"FLAGS",
				"  -c, --config       Read flags from an INI file",
				"  -v, --verbose      Verbose output",
				"  -p, --port         Listen port (default: 8080)",
				"      --name         Service name",
				"      --ratio        Sample ratio (default: 0.250000)",
				"      --start        Start time (default: 1970-01-02T00:00:00)",
				"      --zero         Zero float",
				"  -h, --help         Show this help message",
				"",
				"",
			].join("\n"),
		);
	});

	it("renders time defaults at both ends of the four-digit year range", () => {
		const registry = new FlagRegistry();
		registry.time(cell(0), "first", "", -62_167_219_200, "");
		registry.time(cell(0), "last", "", 253_402_300_799, "");
		expect(registry.flags.map(defaultSuffix)).toEqual([
			" (default: 0000-01-01T00:00:00)",
			" (default: 9999-12-31T23:59:59)",
		]);
	});

	it("stays renderable after an out-of-range time default is refused", () => {
		const registry = new FlagRegistry();
		registry.time(cell(0), "when", "", 1e13, "");
		expect(formatUsage(registry)).toBe(
			"FLAGS\n  -h, --help  Show this help message\n\n",
		);
	});

	it("renders only help for an empty registry", () => {
		expect(formatUsage(new FlagRegistry())).toBe(
			"FLAGS\n  -h, --help  Show this help message\n\n",
		);
	});
});

describe("defaultSuffix", () => {
	it("hides empty and zero defaults", () => {
		const registry = new FlagRegistry();
		registry.string(cell(""), "name", "", "", "");
		registry.int(cell(0), "count", "", 0, "");
		registry.time(cell(0), "start", "", 0, "");
		expect(registry.flags.map(defaultSuffix)).toEqual(["", "", ""]);
	});

	it("never shows a bool default", () => {
		const registry = new FlagRegistry();
		registry.bool(cell(true), "verbose", "", "");
		expect(registry.flags.map(defaultSuffix)).toEqual([""]);
	});

	it("prints non-finite numbers as text", () => {
		const registry = new FlagRegistry();
		registry.double(cell(0), "limit", "", Number.NaN, "");
		registry.double(cell(0), "cap", "", Number.POSITIVE_INFINITY, "");
		expect(registry.flags.map(defaultSuffix)).toEqual([
			" (default: NaN)",
			" (default: Infinity)",
		]);
	});

	it("prints negative ints as given", () => {
		const registry = new FlagRegistry();
		registry.int(cell(0), "offset", "", -3, "");
		expect(registry.flags.map(defaultSuffix)).toEqual([" (default: -3)"]);
	});
});

describe("describeFlagError", () => {
	it.each([
		{ error: new UnknownFlag({ flagName: "--x" }), text: 'unknown flag "--x"' },
		{
			error: new MissingValue({ flagName: "port" }),
			text: 'missing value for flag "port"',
		},
		{
			error: new InvalidValue({
				flagName: "port",
				detail: "expected a base-10 integer",
			}),
			text: 'invalid value for flag "port": expected a base-10 integer',
		},
		{
			error: new OpenConfigFailed({
				flagName: "config",
				detail: "a.ini: not found",
			}),
			text: 'failed to open config file for flag "config": a.ini: not found',
		},
		{ error: new HelpRequested({ flagName: "-h" }), text: 'help requested by "-h"' },
	])("renders $text", ({ error, text }) => {
		expect(describeFlagError(error)).toBe(text);
	});

	it("prefixes the error line", () => {
		expect(formatErrorLine(new UnknownFlag({ flagName: "--x" }))).toBe(
			'ERROR: unknown flag "--x"',
		);
	});
});
