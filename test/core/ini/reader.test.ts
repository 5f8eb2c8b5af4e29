// PURITY: CORE
// INVARIANT: Continuation fragments join with exactly one space

import { describe, expect, it } from "vitest";

import { MemoryLineSource } from "../../../src/core/ini/memory-source.js";
import { IniReader, type IniReaderLimits } from "../../../src/core/ini/reader.js";
import { LineScanner } from "../../../src/core/ini/scanner.js";
import { DEFAULT_LIMITS } from "../../../src/core/limits.js";
import { expectLeft, expectRight } from "../../utils/either.js";

const reader = (
	text: string,
	limits: IniReaderLimits = DEFAULT_LIMITS,
): IniReader =>
	new IniReader(LineScanner.borrow(new MemoryLineSource(text), 511), limits);

describe("IniReader.nextKey", () => {
	it("reads key and value around the first =", () => {
		const ini = reader("name = a=b\n");
		expect(expectRight(ini.nextKey())).toBe("name");
		expect(ini.nextValue()).toBe("a=b");
		expect(expectRight(ini.nextKey())).toBeNull();
	});

	it("skips blank lines and both comment styles", () => {
		const ini = reader("; note\n# note\n\n   \n  port = 1\n");
		expect(expectRight(ini.nextKey())).toBe("port");
		expect(ini.lineNumber).toBe(5);
	});

	it.each(["a=1", "=1", " =1", "novalue"])("rejects %j", (line) => {
		const error = expectLeft(reader(`${line}\n`).nextKey());
		expect(error).toMatchObject({
			_tag: "IniSyntaxError",
			line: 1,
			text: line.trim(),
		});
	});

	it("accepts a two-character key", () => {
		const ini = reader("ab=1");
		expect(expectRight(ini.nextKey())).toBe("ab");
		expect(ini.nextValue()).toBe("1");
	});

	it("reports keys beyond the key capacity, truncated", () => {
		const error = expectLeft(
			reader("abcd = 1", { ...DEFAULT_LIMITS, maxKeyLength: 3 }).nextKey(),
		);
		expect(error).toMatchObject({ _tag: "IniKeyOverflow", line: 1, key: "abc" });
	});

	it("returns null for comment-only content", () => {
		expect(expectRight(reader("; only\n# comments\n").nextKey())).toBeNull();
	});
});

describe("IniReader.nextValue", () => {
	it("is empty for a key without a value", () => {
		const ini = reader("key =\n");
		ini.nextKey();
		expect(ini.nextValue()).toBe("");
	});

	it("drops a trailing carriage return", () => {
		const ini = reader("key = v\r\n");
		ini.nextKey();
		expect(ini.nextValue()).toBe("v");
	});

	it("joins continuation lines with one space", () => {
		const ini = reader("name = part1 \\\npart2\nnext = 1\n");
		ini.nextKey();
		expect(ini.nextValue()).toBe("part1 part2");
		expect(expectRight(ini.nextKey())).toBe("next");
	});

	it("left-trims each continuation fragment", () => {
		const ini = reader("k = a \\\n   b \\\nc\n");
		ini.nextKey();
		expect(ini.nextValue()).toBe("a b c");
	});

	it("stops at end of input after a marker", () => {
		const ini = reader("k = a \\");
		ini.nextKey();
		expect(ini.nextValue()).toBe("a");
	});

	it("stops at an empty continuation line", () => {
		const ini = reader("k = a \\\n\nx = 1\n");
		ini.nextKey();
		expect(ini.nextValue()).toBe("a");
		expect(expectRight(ini.nextKey())).toBe("x");
	});

	it("caps plain values to the value capacity", () => {
		const ini = reader("k = abcdef", { ...DEFAULT_LIMITS, maxValueLength: 4 });
		ini.nextKey();
		expect(ini.nextValue()).toBe("abcd");
	});

	it("caps joined values to the value capacity", () => {
		const ini = reader("k = abc \\\ndefg\n", {
			...DEFAULT_LIMITS,
			maxValueLength: 5,
		});
		ini.nextKey();
		expect(ini.nextValue()).toBe("abc d");
	});
});

describe("IniReader.skipValue", () => {
	it("consumes continuation lines so they are not read as keys", () => {
		const ini = reader("k = a \\\nb = c \\\nd\nnext = 1\n");
		ini.nextKey();
		ini.skipValue();
		expect(expectRight(ini.nextKey())).toBe("next");
	});
});
