// FORMAT THEOREM: ∀n ∈ int32: parse(["prog", "--port", String(n)]) ⇒ port = n
// PURITY: CORE
// INVARIANT: Parsing stops at the first error; earlier assignments stay

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { INT32_MAX, INT32_MIN } from "../../src/core/coerce.js";
import { cell } from "../../src/core/destination.js";
import { classifyArgument, parseArguments } from "../../src/core/parser.js";
import { FlagRegistry, type FlagRegistryOptions } from "../../src/core/registry.js";
import { expectLeft, expectRight } from "../utils/either.js";
import { memoryOpener } from "../utils/sources.js";

const setup = (
	options: FlagRegistryOptions = {},
	files: Readonly<Record<string, string>> = {},
) => {
	const registry = new FlagRegistry(options);
	const verbose = cell(false);
	const port = cell(0);
	const name = cell("");
	const ratio = cell(0);
	registry.bool(verbose, "verbose", "v", "Verbose output");
	registry.int(port, "port", "p", 8080, "Listen port");
	registry.string(name, "name", "n", "anon", "Service name");
	registry.double(ratio, "ratio", "", 0.5, "Sample ratio");
	const { opener } = memoryOpener(files);
	const parse = (...args: string[]) =>
		parseArguments(registry, ["prog", ...args], opener);
	return { registry, verbose, port, name, ratio, parse };
};

describe("parseArguments", () => {
	it("keeps defaults when only the program name is given", () => {
		const t = setup();
		expectRight(t.parse());
		expect(t.port.value).toBe(8080);
		expect(t.name.value).toBe("anon");
		expect(t.verbose.value).toBe(false);
		expect(t.registry.parsed).toBe(true);
		expect(t.registry.errorKind).toBe("None");
	});

	it("assigns flags by short name and by long prefix", () => {
		const t = setup();
		expectRight(t.parse("-v", "--po", "9000", "--na", "bob", "--ratio", "2.5e1x"));
		expect(t.verbose.value).toBe(true);
		expect(t.port.value).toBe(9000);
		expect(t.name.value).toBe("bob");
		expect(t.ratio.value).toBe(25);
	});

	it("lets the last occurrence win", () => {
		const t = setup();
		expectRight(t.parse("--port", "1", "-p", "2"));
		expect(t.port.value).toBe(2);
	});

	it("never lets a bool consume the next token", () => {
		const t = setup();
		expect(expectLeft(t.parse("-v", "false"))).toMatchObject({
			_tag: "UnknownFlag",
			flagName: "false",
		});
		expect(t.verbose.value).toBe(true);
	});

	it("reports a missing value against the flag name", () => {
		const t = setup();
		const error = expectLeft(t.parse("--po"));
		expect(error).toMatchObject({ _tag: "MissingValue", flagName: "port" });
		expect(t.registry.error).toBe(error);
	});

	it("reports an invalid value and keeps earlier assignments", () => {
		const t = setup();
		expect(expectLeft(t.parse("-v", "-p", "x"))).toMatchObject({
			_tag: "InvalidValue",
			flagName: "port",
			detail: "expected a base-10 integer",
		});
		expect(t.verbose.value).toBe(true);
		expect(t.port.value).toBe(8080);
	});

	it("treats a bare -- as a prefix of the first registered flag", () => {
		const t = setup();
		expectRight(t.parse("--"));
		expect(t.verbose.value).toBe(true);
	});

	it("gives a bare -- to the config flag before any other flag", () => {
		const t = setup({}, { "base.ini": "port = 7\n" });
		t.registry.registerConfigFlag("config", "c", "");
		expectRight(t.parse("--", "base.ini"));
		expect(t.port.value).toBe(7);
		expect(t.verbose.value).toBe(false);
	});

	it.each(["--nope", "file.txt", "-", "-vx"])(
		"reports %j as unknown by its literal text",
		(token) => {
			const t = setup();
			expect(expectLeft(t.parse(token))).toMatchObject({
				_tag: "UnknownFlag",
				flagName: token,
			});
		},
	);

	it("bounds the recorded name", () => {
		const t = setup();
		const token = `--${"x".repeat(98)}`;
		expect(expectLeft(t.parse(token)).flagName).toBe(token.slice(0, 63));
	});

	it.each(["--help", "-h"])("stops on %j with a help request", (token) => {
		const t = setup();
		expect(expectLeft(t.parse(token, "--nope"))).toMatchObject({
			_tag: "Help",
			flagName: token,
		});
		expect(t.registry.errorKind).toBe("Help");
	});

	it("prefers a registered flag that --help prefix-matches", () => {
		const registry = new FlagRegistry();
		const helpful = cell(false);
		registry.bool(helpful, "helpful", "", "");
		expectRight(parseArguments(registry, ["prog", "--help"], memoryOpener({}).opener));
		expect(helpful.value).toBe(true);
	});

	it("skips unknown and help tokens when ignoring unknown flags", () => {
		const t = setup({ ignoreUnknown: true });
		expectRight(t.parse("--nope", "stray", "-p", "3", "--help"));
		expect(t.port.value).toBe(3);
	});

	it("keeps the first error across parses", () => {
		const t = setup();
		expectLeft(t.parse("--nope"));
		expect(expectLeft(t.parse("--port"))).toMatchObject({ _tag: "UnknownFlag" });
		expect(t.registry.errorKind).toBe("UnknownFlag");
	});

	it("freezes the registry", () => {
		const t = setup();
		t.parse();
		expect(expectLeft(t.registry.bool(cell(false), "late", "", ""))._tag).toBe(
			"RegistryFrozen",
		);
	});

	it("reads back any 32-bit integer", () => {
		fc.assert(
			fc.property(fc.integer({ min: INT32_MIN, max: INT32_MAX }), (n) => {
				const t = setup();
				expectRight(t.parse("--port", String(n)));
				expect(t.port.value).toBe(n);
			}),
		);
	});
});

describe("parseArguments with a config flag", () => {
	const withConfig = (files: Readonly<Record<string, string>>) => {
		const t = setup({}, files);
		t.registry.registerConfigFlag("config", "c", "Config file");
		return t;
	};

	it("merges files in argument order", () => {
		const files = { "a.ini": "port = 7\nname = file\n" };
		const before = withConfig(files);
		expectRight(before.parse("-c", "a.ini", "-p", "8"));
		expect(before.port.value).toBe(8);
		expect(before.name.value).toBe("file");

		const after = withConfig(files);
		expectRight(after.parse("-p", "8", "--config", "a.ini"));
		expect(after.port.value).toBe(7);
	});

	it("matches the config flag before other flags", () => {
		const t = withConfig({ "a.ini": "port = 7\n" });
		t.registry.bool(cell(false), "colour", "", "");
		expectRight(t.parse("--co", "a.ini"));
		expect(t.port.value).toBe(7);
	});

	it("reports a missing file name against the literal token", () => {
		const t = withConfig({});
		expect(expectLeft(t.parse("--conf"))).toMatchObject({
			_tag: "MissingValue",
			flagName: "--conf",
		});
	});

	it("stops when the file cannot be opened", () => {
		const t = withConfig({});
		expect(expectLeft(t.parse("-c", "nope.ini", "-p", "1"))).toMatchObject({
			_tag: "OpenConfigFailed",
			flagName: "config",
			detail: "nope.ini: not found",
		});
		expect(t.port.value).toBe(8080);
	});
});

describe("classifyArgument", () => {
	it("orders config, flag, skip, help and unknown", () => {
		const t = setup();
		t.registry.registerConfigFlag("config", "c", "");
		expect(classifyArgument(t.registry, "-c")._tag).toBe("Config");
		expect(classifyArgument(t.registry, "-v")).toMatchObject({ _tag: "Flag" });
		expect(classifyArgument(t.registry, "-h")._tag).toBe("Help");
		expect(classifyArgument(t.registry, "-z")._tag).toBe("Unknown");
		t.registry.ignoreUnknown();
		expect(classifyArgument(t.registry, "-h")._tag).toBe("Skipped");
	});
});
